import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { InspectionContext, inspect, type TokenStore } from '@trivia-kit/core'
import {
	formatReadError,
	formatSummary,
	getErrorMessage,
	parseTokenStream,
	resolveInspectOptions,
	TokenStreamError,
} from '../utils.ts'

export default class InspectCommand extends BaseCommand {
	static override commandName = 'inspect'
	static override description = 'Report blank lines and trailing whitespace in a lexed token stream'

	@args.string({ description: 'Token stream file (JSON) to inspect' })
	declare input: string

	@flags.boolean({ default: false, description: 'Do not report blank lines in front of tokens' })
	declare skipBlankLines: boolean

	@flags.boolean({ default: false, description: 'Do not report whitespace at the end of lines' })
	declare skipTrailingWhitespace: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private parseSource(content: string): TokenStore | null {
		try {
			return parseTokenStream(content)
		} catch (error: unknown) {
			if (!(error instanceof TokenStreamError)) throw error
			this.logger.error(getErrorMessage(error))
			this.exitCode = 1
			return null
		}
	}

	override async run(): Promise<void> {
		const content = await this.readSourceFile()
		if (content === null) return

		const tokens = this.parseSource(content)
		if (tokens === null) return

		const ctx = new InspectionContext(tokens, this.input)
		const options = resolveInspectOptions(this.skipBlankLines, this.skipTrailingWhitespace)
		const { findings } = inspect(ctx, options)

		if (findings === 0) {
			this.logger.success(formatSummary(ctx))
			return
		}

		this.logger.log(ctx.formatAllDiagnostics())
		this.logger.warning(formatSummary(ctx))
		this.exitCode = 1
	}
}
