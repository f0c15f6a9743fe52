/**
 * Packager - Turns one annotated source file into an npm tarball.
 *
 * check -> chunk -> resolve -> stage -> build -> cleanup
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {SourceChunker} from '../chunker/index.js';
import type {ChunkedSource} from '../chunker/types.js';
import {DEFAULT_CONFIG, type SolopackConfig} from '../lib/config.js';
import {UnsupportedSourceError} from '../lib/errors.js';
import {runCommand, type CommandRunner} from '../lib/exec.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import {
	EXTENSION_TO_SOURCE_KIND,
	TreeSitterLexer,
	type Lexer,
	type SourceKind,
	type SourceLanguage,
} from '../lexer/index.js';
import {
	loadGitIdentity,
	NO_IDENTITY,
	parseMetadata,
	resolveMetadata,
	type IdentityLookup,
	type InferenceNotice,
	type MetadataDefaults,
	type PackageDescriptor,
	type RawMetadata,
} from '../metadata/index.js';
import {buildPackage} from './build.js';
import {checkSourceReadable, checkSourceSyntax} from './syntax-check.js';
import {writeStagingDir} from './staging.js';

const COMPONENT = 'Packager';

export type PackStep = 'check' | 'chunk' | 'resolve' | 'stage' | 'build';

export const PACK_STEPS: readonly PackStep[] = [
	'check',
	'chunk',
	'resolve',
	'stage',
	'build',
];

export interface ClosableLexer extends Lexer {
	close?(): void;
}

export type LexerFactory = (language: SourceLanguage) => Promise<ClosableLexer>;

export const createTreeSitterLexer: LexerFactory = async language => {
	const lexer = new TreeSitterLexer(language);
	await lexer.initialize();
	return lexer;
};

export interface PackagerOptions {
	sourcePath: string;
	/** Where the tarball goes (default: current directory) */
	outDir?: string;
	config?: SolopackConfig;
	runner?: CommandRunner;
	createLexer?: LexerFactory;
	/** Overrides the git identity lookup */
	identity?: IdentityLookup;
	/** Parent directory for the staging directory (default: OS temp dir) */
	tmpRoot?: string;
	logger?: Logger;
	onStep?: (step: PackStep) => void;
	onNotice?: (notice: InferenceNotice) => void;
}

export interface PackResult {
	tarballPath: string;
	descriptor: PackageDescriptor;
	notices: InferenceNotice[];
	/** Set only when the staging directory was kept */
	stagingDir: string | null;
}

export class Packager {
	private readonly sourcePath: string;
	private readonly outDir: string;
	private readonly config: SolopackConfig;
	private readonly runner: CommandRunner;
	private readonly createLexer: LexerFactory;
	private readonly logger: Logger;
	private readonly options: PackagerOptions;

	constructor(options: PackagerOptions) {
		this.options = options;
		this.sourcePath = path.resolve(options.sourcePath);
		this.outDir = path.resolve(options.outDir ?? process.cwd());
		this.config = options.config ?? DEFAULT_CONFIG;
		this.runner = options.runner ?? runCommand;
		this.createLexer = options.createLexer ?? createTreeSitterLexer;
		this.logger = options.logger ?? createNullLogger();
	}

	/**
	 * Package name: the source file name without its extension.
	 */
	get packageName(): string {
		return path.basename(this.sourcePath, path.extname(this.sourcePath));
	}

	get sourceKind(): SourceKind {
		const extension = path.extname(this.sourcePath);
		const kind = EXTENSION_TO_SOURCE_KIND[extension];
		if (!kind) {
			throw new UnsupportedSourceError(this.sourcePath, extension);
		}
		return kind;
	}

	async package(): Promise<PackResult> {
		const kind = this.sourceKind;

		this.step('check');
		await this.checkSource();

		this.step('chunk');
		const chunked = await this.readSourceParts(kind.language);

		this.step('resolve');
		const notices: InferenceNotice[] = [];
		const descriptor = await this.resolveDescriptor(chunked, notice => {
			notices.push(notice);
			this.logger.warn(COMPONENT, notice.message);
			this.options.onNotice?.(notice);
		});

		this.step('stage');
		const stagingDir = await writeStagingDir(
			{
				descriptor,
				moduleFormat: kind.moduleFormat,
				readme: chunked.readme,
				library: chunked.library,
			},
			this.options.tmpRoot,
		);
		this.logger.info(COMPONENT, `Using ${stagingDir} to build the package`);

		try {
			this.step('build');
			await fs.mkdir(this.outDir, {recursive: true});
			const tarballPath = await buildPackage({
				stagingDir,
				outDir: this.outDir,
				runner: this.runner,
				npm: this.config.commands.npm,
			});
			this.logger.info(COMPONENT, `Built ${tarballPath}`);

			return {
				tarballPath,
				descriptor,
				notices,
				stagingDir: this.config.keepStagingDir ? stagingDir : null,
			};
		} finally {
			if (!this.config.keepStagingDir) {
				await fs.rm(stagingDir, {recursive: true, force: true});
			}
		}
	}

	private step(step: PackStep): void {
		this.logger.debug(COMPONENT, `Step: ${step}`, {source: this.sourcePath});
		this.options.onStep?.(step);
	}

	private async checkSource(): Promise<void> {
		await checkSourceReadable(this.sourcePath);
		if (this.config.syntaxCheck) {
			await checkSourceSyntax(
				this.sourcePath,
				this.runner,
				this.config.commands.node,
			);
		}
	}

	private async readSourceParts(
		language: SourceLanguage,
	): Promise<ChunkedSource> {
		const text = await fs.readFile(this.sourcePath, 'utf-8');
		const lexer = await this.createLexer(language);
		try {
			return new SourceChunker(lexer).chunk(text);
		} finally {
			lexer.close?.();
		}
	}

	private async resolveDescriptor(
		chunked: ChunkedSource,
		onNotice: (notice: InferenceNotice) => void,
	): Promise<PackageDescriptor> {
		const raw = parseMetadata(chunked.metadata);
		const defaults: MetadataDefaults = {
			...this.config.defaults,
			name: this.packageName,
		};
		const identity = await this.resolveIdentity(raw, defaults);

		return resolveMetadata(raw, defaults, chunked.readme, {
			identity,
			onNotice,
			libraryExtension: path.extname(this.sourcePath),
		});
	}

	/**
	 * git is only consulted when author or email has no other source.
	 */
	private async resolveIdentity(
		raw: RawMetadata,
		defaults: MetadataDefaults,
	): Promise<IdentityLookup> {
		if (this.options.identity) return this.options.identity;
		if (!this.config.useGitIdentity) return NO_IDENTITY;

		const needsIdentity = (['author', 'email'] as const).some(
			field => !raw[field]?.trim() && !defaults[field]?.trim(),
		);
		if (!needsIdentity) return NO_IDENTITY;

		return loadGitIdentity(this.runner, this.config.commands.git, this.logger);
	}
}
