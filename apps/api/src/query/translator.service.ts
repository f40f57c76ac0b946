import { Inject, Injectable, Logger } from '@nestjs/common';
import { TranslationError, describeCause } from './errors';
import { SCHEMA_CONTEXT, questionPrompt } from './schema-context';
import { TEXT_GENERATOR, TextGenerator } from './text-generator';

/** Removes a markdown fence the model may wrap around its answer. */
export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```\w*\s*\n?/i, '')
    .replace(/\n?\s*```$/i, '')
    .trim();
}

function isQuotaError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'status' in err && err.status === 429;
}

@Injectable()
export class TranslatorService {
  private readonly logger = new Logger(TranslatorService.name);

  constructor(@Inject(TEXT_GENERATOR) private readonly generator: TextGenerator) {}

  /** Returns the model's SQL for `question`, unvalidated. */
  async toSql(question: string): Promise<string> {
    let content: string | null;
    try {
      content = await this.generator.complete({
        system: SCHEMA_CONTEXT,
        user: questionPrompt(question),
      });
    } catch (err: unknown) {
      const reason = isQuotaError(err) ? 'quota exceeded (429)' : describeCause(err);
      this.logger.error(`Translation request failed: ${reason}`);
      throw new TranslationError(undefined, { cause: err });
    }

    const sql = content ? stripCodeFence(content) : '';
    if (!sql) {
      this.logger.error('Translation returned no text.');
      throw new TranslationError();
    }
    this.logger.debug(`Generated SQL: ${sql}`);
    return sql;
  }
}
