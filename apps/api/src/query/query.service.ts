import { Injectable } from '@nestjs/common';
import { QueryExecutorService } from './executor.service';
import { ResultSet } from './result-set';
import { TranslatorService } from './translator.service';

export type AnsweredQuestion = {
  question: string;
  sql: string;
  result: ResultSet;
};

@Injectable()
export class QueryService {
  constructor(
    private readonly translator: TranslatorService,
    private readonly executor: QueryExecutorService,
  ) {}

  naturalLanguageToSql(question: string): Promise<string> {
    return this.translator.toSql(question);
  }

  executeSql(sql: string): Promise<ResultSet> {
    return this.executor.execute(sql);
  }

  /** Translate, then execute. A failed translation never reaches the database. */
  async answer(question: string): Promise<AnsweredQuestion> {
    const sql = await this.translator.toSql(question);
    const result = await this.executor.execute(sql);
    return { question, sql, result };
  }
}
