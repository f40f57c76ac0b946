import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Post,
  StreamableFile,
  UseFilters,
} from '@nestjs/common';
import { HomePage, ResultPage } from '../views/pages';
import { renderPage } from '../views/render';
import { AskQuestionDto, DownloadDto, requiredText } from './dto/query.dto';
import { exportResult, parseExportFormat } from './export/result-export';
import { PageExceptionFilter } from './page-exception.filter';
import { QueryService } from './query.service';

const HTML = 'text/html; charset=utf-8';

/** The form, result and download routes used from the browser. */
@Controller()
@UseFilters(PageExceptionFilter)
export class QueryController {
  constructor(private readonly queryService: QueryService) {}

  @Get()
  @Header('Content-Type', HTML)
  home(): string {
    return renderPage(HomePage({}));
  }

  @Post('query')
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', HTML)
  async ask(@Body() dto: AskQuestionDto): Promise<string> {
    const question = requiredText(dto?.question);
    if (!question) {
      return renderPage(HomePage({ notice: 'Please enter a question.' }));
    }
    const answered = await this.queryService.answer(question);
    return renderPage(ResultPage(answered));
  }

  @Post('download')
  @HttpCode(HttpStatus.OK)
  async download(@Body() dto: DownloadDto): Promise<StreamableFile> {
    const sql = requiredText(dto?.sql);
    if (!sql) {
      throw new BadRequestException('There is no query to download.');
    }
    const format = parseExportFormat(typeof dto?.format === 'string' ? dto.format : undefined);
    if (!format) {
      throw new BadRequestException('Unknown file format; choose CSV or Excel.');
    }
    const file = exportResult(await this.queryService.executeSql(sql), format);
    return new StreamableFile(file.body, {
      type: file.contentType,
      disposition: `attachment; filename="${file.filename}"`,
      length: file.body.length,
    });
  }
}
