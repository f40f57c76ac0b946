import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseFilters,
} from '@nestjs/common';
import { AskQuestionDto, ExecuteSqlDto, requiredText } from './dto/query.dto';
import { QueryExceptionFilter } from './query-exception.filter';
import { QueryService } from './query.service';
import { JsonCell, ResultSet, toJsonCell } from './result-set';

type JsonResult = {
  columns: string[];
  rows: JsonCell[][];
  rowCount: number;
};

function toJsonResult(result: ResultSet): JsonResult {
  return {
    columns: result.columns,
    rows: result.rows.map((row) => row.map(toJsonCell)),
    rowCount: result.rows.length,
  };
}

function questionFrom(dto: AskQuestionDto): string {
  const question = requiredText(dto?.question);
  if (!question) {
    throw new BadRequestException('Body must include a non-empty "question" string.');
  }
  return question;
}

@Controller('api/query')
@UseFilters(QueryExceptionFilter)
export class QueryApiController {
  constructor(private readonly queryService: QueryService) {}

  @Post('nl-to-sql')
  @HttpCode(HttpStatus.OK)
  async naturalLanguageToSql(@Body() dto: AskQuestionDto): Promise<{ sql: string }> {
    const sql = await this.queryService.naturalLanguageToSql(questionFrom(dto));
    return { sql };
  }

  @Post('execute')
  @HttpCode(HttpStatus.OK)
  async executeSql(@Body() dto: ExecuteSqlDto): Promise<JsonResult> {
    const sql = requiredText(dto?.sql);
    if (!sql) {
      throw new BadRequestException('Body must include a non-empty "sql" string.');
    }
    return toJsonResult(await this.queryService.executeSql(sql));
  }

  @Post('run')
  @HttpCode(HttpStatus.OK)
  async run(@Body() dto: AskQuestionDto): Promise<JsonResult & { sql: string }> {
    const { sql, result } = await this.queryService.answer(questionFrom(dto));
    return { sql, ...toJsonResult(result) };
  }
}
