import { readFile, writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { format, type FormatResult, type IndentConfig } from '@indentkit/formatter'
import {
	formatCheckFailure,
	formatFormatError,
	formatInvalidIndentError,
	formatReadError,
	formatWriteError,
	resolveIndentFlags,
} from '../utils.ts'

export default class FormatCommand extends BaseCommand {
	static override commandName = 'format'
	static override description = 'Re-indent Swift source files'

	@args.spread({ description: 'Swift files to format' })
	declare files: string[]

	@flags.string({
		default: '4',
		description: 'Indentation unit: <n> spaces, tab, tabs:<n> or spaces:<n>',
	})
	declare indent: string

	@flags.boolean({ description: 'Indent case labels one level inside switch' })
	declare indentSwitchCase: boolean

	@flags.boolean({ description: 'Indent the contents of #if regions' })
	declare indentIfConfig: boolean

	@flags.boolean({
		default: true,
		description: 'Keep the indentation of lines starting with //',
		showNegatedVariantInHelp: true,
	})
	declare skipCommented: boolean

	@flags.boolean({
		default: true,
		description: 'Align closing parens and trailing-closure braces the way Xcode does',
		showNegatedVariantInHelp: true,
	})
	declare editorCompat: boolean

	@flags.boolean({ description: 'Report files that would change and write nothing' })
	declare check: boolean

	@flags.boolean({ alias: 'w', description: 'Rewrite files in place' })
	declare write: boolean

	private resolveConfig(): IndentConfig | null {
		const config = resolveIndentFlags(this)
		if (config === null) {
			this.logger.error(formatInvalidIndentError(this.indent))
			this.exitCode = 1
		}
		return config
	}

	private async readSourceFile(filePath: string): Promise<string | null> {
		try {
			return await readFile(filePath, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(filePath, error))
			this.exitCode = 1
			return null
		}
	}

	private formatSource(filePath: string, source: string, config: IndentConfig): FormatResult | null {
		try {
			return format(source, { filename: filePath, indent: config })
		} catch (error: unknown) {
			this.logger.error(formatFormatError(error))
			this.exitCode = 1
			return null
		}
	}

	private async writeOutputFile(filePath: string, content: string): Promise<void> {
		try {
			await writeFile(filePath, content)
			this.logger.success(`reindented ${filePath}`)
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
		}
	}

	private async processFile(filePath: string, config: IndentConfig): Promise<boolean> {
		const source = await this.readSourceFile(filePath)
		if (source === null) return false

		const result = this.formatSource(filePath, source, config)
		if (result === null) return false

		if (this.check) {
			if (result.changed) this.logger.warning(formatCheckFailure(filePath))
			return result.changed
		}
		if (this.write) {
			if (result.changed) await this.writeOutputFile(filePath, result.output)
			else this.logger.info(`${filePath} is already indented`)
			return false
		}
		process.stdout.write(result.output)
		return false
	}

	override async run(): Promise<void> {
		const config = this.resolveConfig()
		if (config === null) return

		let wouldChange = 0
		for (const filePath of this.files) {
			if (await this.processFile(filePath, config)) wouldChange++
		}

		if (wouldChange > 0) {
			this.logger.error(`${wouldChange} file(s) would be reindented`)
			this.exitCode = 1
		}
	}
}
