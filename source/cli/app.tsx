import React, {useEffect, useState} from 'react';
import {useApp} from 'ink';
import type {InferenceNotice} from '../metadata/index.js';
import {
	Packager,
	type PackagerOptions,
	type PackResult,
} from '../package/index.js';
import PackView from './components/PackView.js';
import type {Logger} from '../lib/logger.js';
import type {PackStatus} from './types.js';
import {handleCliError} from './utils/error-handler.js';

type Props = {
	options: Omit<PackagerOptions, 'onStep' | 'onNotice'>;
	/** CLI logger; the packager logs through `options.logger` */
	logger?: Logger;
};

export default function App({options, logger}: Props) {
	const {exit} = useApp();
	const [status, setStatus] = useState<PackStatus>({
		state: 'running',
		step: null,
	});
	const [notices, setNotices] = useState<InferenceNotice[]>([]);
	const [result, setResult] = useState<PackResult | null>(null);
	const [error, setError] = useState<Error | null>(null);

	useEffect(() => {
		let lastStep: PackStatus = {state: 'running', step: null};
		const packager = new Packager({
			...options,
			onStep(step) {
				lastStep = {state: 'running', step};
				setStatus(lastStep);
			},
			onNotice(notice) {
				setNotices(previous => [...previous, notice]);
			},
		});

		packager
			.package()
			.then(packResult => {
				setResult(packResult);
				setStatus({state: 'done'});
				exit();
			})
			.catch((packError: unknown) => {
				const failure =
					packError instanceof Error ? packError : new Error(String(packError));
				handleCliError('PackCommand', failure, logger, {
					skipConsole: true,
				});
				setError(failure);
				setStatus({
					state: 'failed',
					step: lastStep.state === 'running' ? lastStep.step : null,
				});
				exit(failure);
			});
	}, []);

	return (
		<PackView
			sourcePath={options.sourcePath}
			status={status}
			notices={notices}
			result={result}
			error={error}
		/>
	);
}
