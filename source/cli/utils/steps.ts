import {PACK_STEPS, type PackStep} from '../../package/index.js';
import type {PackStatus, StepState, StepStatus} from '../types.js';

export const STEP_LABELS: Record<PackStep, string> = {
	check: 'Checking source',
	chunk: 'Chunking source',
	resolve: 'Resolving metadata',
	stage: 'Staging package',
	build: 'Building tarball',
};

/**
 * Status of every step given the overall run status.
 */
export function getStepStates(status: PackStatus): StepState[] {
	if (status.state === 'done') {
		return PACK_STEPS.map(step => ({step, status: 'done'}));
	}

	const currentIndex = status.step ? PACK_STEPS.indexOf(status.step) : -1;
	const active: StepStatus = status.state === 'failed' ? 'failed' : 'running';

	return PACK_STEPS.map((step, index) => {
		if (index < currentIndex) return {step, status: 'done'};
		if (index === currentIndex) return {step, status: active};
		return {step, status: 'pending'};
	});
}
