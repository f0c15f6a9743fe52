#!/usr/bin/env node
import React from 'react';
import {render} from 'ink';
import meow from 'meow';
import {loadConfig, type SolopackConfig} from '../lib/config.js';
import {createServiceLogger} from '../lib/logger.js';
import App from './app.js';
import {createCliLogger, handleCliError} from './utils/error-handler.js';

const cli = meow(
	`
	Usage
	  $ solopack <file>

	Options
	  --out-dir, -o      Directory to write the tarball to (default: cwd)
	  --config, -c       Config file (default: $SOLOPACK_HOME/config.json)
	  --keep-staging     Keep the staging directory after building
	  --no-syntax-check  Skip \`node --check\` on the source
	  --help             Show help
	  --version          Show version

	Examples
	  $ solopack tiny-tool.js
	  $ solopack tiny-tool.mjs --out-dir dist
`,
	{
		importMeta: import.meta,
		// Unset boolean flags fall back to the config file
		booleanDefault: undefined,
		flags: {
			outDir: {type: 'string', shortFlag: 'o'},
			config: {type: 'string', shortFlag: 'c'},
			keepStaging: {type: 'boolean'},
			syntaxCheck: {type: 'boolean'},
		},
	},
);

const logger = createCliLogger();
const [sourceArg] = cli.input;

async function run(sourcePath: string): Promise<void> {
	let config: SolopackConfig;
	try {
		config = await loadConfig(cli.flags.config);
	} catch (error) {
		handleCliError('Config', error, logger);
		process.exitCode = 1;
		return;
	}

	if (cli.flags.keepStaging !== undefined) {
		config.keepStagingDir = cli.flags.keepStaging;
	}
	if (cli.flags.syntaxCheck !== undefined) {
		config.syntaxCheck = cli.flags.syntaxCheck;
	}

	const {waitUntilExit} = render(
		<App
			options={{
				sourcePath,
				outDir: cli.flags.outDir,
				config,
				logger: createServiceLogger('packager'),
			}}
			logger={logger}
		/>,
	);

	try {
		await waitUntilExit();
	} catch {
		// Already rendered and logged by the app
		process.exitCode = 1;
	}
}

if (sourceArg) {
	await run(sourceArg);
} else {
	cli.showHelp(2);
}
