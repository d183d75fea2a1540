import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	buildDocument,
	type Diagnostic,
	type EmitOptions,
	emit,
	resolveConfig,
	SimpleFiles,
	WriteFailureError,
} from '@gutter/diagnostics'
import { debugDocument, FdWriter, type StyledWriter } from '@gutter/render-tree'
import { supportsColorStderr } from 'chalk'
import { buildInput, type DiagnosticInput, InputError, parseInput, sourcePaths } from '../input.ts'
import {
	colorLevel,
	colorModeDiagnostic,
	formatCatalogLine,
	inputErrorDiagnostic,
	isColorMode,
	optionDiagnostic,
	readErrorDiagnostic,
	renderFailureDiagnostic,
} from '../utils.ts'

export default class RenderCommand extends BaseCommand {
	static override commandName = 'render'
	static override description = 'Render the diagnostics described in a JSON file'

	@args.string({ description: 'JSON file listing the diagnostics' })
	declare input: string

	@flags.string({ default: 'auto', description: 'Color output: auto, always or never' })
	declare color: string

	@flags.number({ description: 'Tab stop width (default 4)' })
	declare tabWidth?: number

	@flags.number({ description: 'Context lines around labelled lines (default 0)' })
	declare context?: number

	@flags.number({ description: 'Interior lines after which multi-line spans are elided (default 3)' })
	declare elisionThreshold?: number

	@flags.boolean({ description: 'Log the document tree of each diagnostic' })
	declare debug: boolean

	private writer: StyledWriter = new FdWriter(process.stderr.fd, 0)

	/**
	 * Print a CLI diagnostic through the emitter, falling back to the logger
	 * when stderr cannot be written.
	 */
	private report(diagnostic: Diagnostic): void {
		this.exitCode = 1
		try {
			emit(this.writer, new SimpleFiles(), diagnostic)
		} catch (error: unknown) {
			this.logger.error(formatCatalogLine(diagnostic))
			this.logger.error(`while reporting: ${error instanceof Error ? error.message : String(error)}`)
		}
	}

	private setupWriter(): boolean {
		if (!isColorMode(this.color)) {
			this.report(colorModeDiagnostic(this.color))
			return false
		}
		const detected = supportsColorStderr === false ? 0 : supportsColorStderr.level
		this.writer = new FdWriter(process.stderr.fd, colorLevel(this.color, detected))
		return true
	}

	private emitOptions(): EmitOptions | null {
		const options: EmitOptions = {
			...(this.tabWidth !== undefined ? { tabWidth: this.tabWidth } : {}),
			...(this.context !== undefined ? { contextLines: this.context } : {}),
			...(this.elisionThreshold !== undefined ? { elisionThreshold: this.elisionThreshold } : {}),
		}
		try {
			resolveConfig(options)
			return options
		} catch (error: unknown) {
			this.report(optionDiagnostic(error))
			return null
		}
	}

	private async readInput(): Promise<DiagnosticInput[] | null> {
		let text: string
		try {
			text = await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.report(readErrorDiagnostic(this.input, error))
			return null
		}
		try {
			return parseInput(text)
		} catch (error: unknown) {
			if (!(error instanceof InputError)) throw error
			this.report(inputErrorDiagnostic(this.input, error.message))
			return null
		}
	}

	private async readSources(inputs: readonly DiagnosticInput[]): Promise<Map<string, string> | null> {
		const base = dirname(this.input)
		const sources = new Map<string, string>()
		for (const path of sourcePaths(inputs)) {
			try {
				sources.set(path, await readFile(resolve(base, path), 'utf-8'))
			} catch (error: unknown) {
				this.report(readErrorDiagnostic(path, error))
				return null
			}
		}
		return sources
	}

	private renderAll(files: SimpleFiles, diagnostics: readonly Diagnostic[], options: EmitOptions): void {
		let failures = 0
		diagnostics.forEach((diagnostic, index) => {
			try {
				if (this.debug) {
					this.logger.info(debugDocument(buildDocument(files, diagnostic, options)))
				}
				emit(this.writer, files, diagnostic, options)
			} catch (error: unknown) {
				failures++
				if (error instanceof WriteFailureError) {
					this.logger.error(error.message)
					this.exitCode = 1
				} else {
					this.report(renderFailureDiagnostic(index + 1, error))
				}
			}
		})

		if (failures > 0) {
			this.exitCode = 1
			this.logger.error(`${failures} of ${diagnostics.length} diagnostics could not be rendered`)
		}
	}

	override async run(): Promise<void> {
		if (!this.setupWriter()) return

		const options = this.emitOptions()
		if (options === null) return

		const inputs = await this.readInput()
		if (inputs === null) return

		const sources = await this.readSources(inputs)
		if (sources === null) return

		let loaded: ReturnType<typeof buildInput>
		try {
			loaded = buildInput(inputs, sources)
		} catch (error: unknown) {
			if (!(error instanceof InputError)) throw error
			this.report(inputErrorDiagnostic(this.input, error.message))
			return
		}

		this.renderAll(loaded.files, loaded.diagnostics, options)
	}
}
