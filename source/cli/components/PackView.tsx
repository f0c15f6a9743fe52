import React from 'react';
import {Box, Text} from 'ink';
import type {InferenceNotice} from '../../metadata/index.js';
import type {PackResult} from '../../package/index.js';
import type {PackStatus, StepStatus} from '../types.js';
import {getStepStates, STEP_LABELS} from '../utils/steps.js';

type Props = {
	sourcePath: string;
	status: PackStatus;
	notices: InferenceNotice[];
	result: PackResult | null;
	error: Error | null;
};

const STEP_ICONS: Record<StepStatus, {icon: string; color: string}> = {
	pending: {icon: '·', color: 'gray'},
	running: {icon: '…', color: 'cyan'},
	done: {icon: '✔', color: 'green'},
	failed: {icon: '✖', color: 'red'},
};

export default function PackView({
	sourcePath,
	status,
	notices,
	result,
	error,
}: Props) {
	return (
		<Box flexDirection="column">
			<Text bold>Packaging {sourcePath}</Text>
			{getStepStates(status).map(({step, status: stepStatus}) => {
				const {icon, color} = STEP_ICONS[stepStatus];
				return (
					<Text key={step} color={color}>
						{icon} {STEP_LABELS[step]}
					</Text>
				);
			})}
			{notices.length > 0 && (
				<Box flexDirection="column" marginTop={1}>
					{notices.map(notice => (
						<Text key={notice.field} color="yellow">
							{notice.message}
						</Text>
					))}
				</Box>
			)}
			{result && (
				<Box flexDirection="column" marginTop={1}>
					<Text color="green">Built {result.tarballPath}</Text>
					<Text dimColor>
						{result.descriptor.name}@{result.descriptor.version}
					</Text>
					{result.stagingDir && (
						<Text dimColor>Staging kept at {result.stagingDir}</Text>
					)}
				</Box>
			)}
			{error && (
				<Box marginTop={1}>
					<Text color="red">{error.message}</Text>
				</Box>
			)}
		</Box>
	);
}
