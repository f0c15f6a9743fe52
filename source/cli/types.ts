import type {PackStep} from '../package/index.js';

export type StepStatus = 'pending' | 'running' | 'done' | 'failed';

export type StepState = {
	step: PackStep;
	status: StepStatus;
};

/**
 * Overall state of one packaging run, as the CLI displays it.
 */
export type PackStatus =
	| {state: 'running'; step: PackStep | null}
	| {state: 'done'}
	| {state: 'failed'; step: PackStep | null};
