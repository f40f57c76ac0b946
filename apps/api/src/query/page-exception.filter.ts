import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorPage } from '../views/pages';
import { renderPage } from '../views/render';
import { requiredText } from './dto/query.dto';
import { toErrorReply } from './http-status';

/** Renders failures of the form routes as the error page, question kept. */
@Catch()
export class PageExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PageExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();
    const { status, message } = toErrorReply(exception);
    if (status === HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(exception instanceof Error ? (exception.stack ?? exception.message) : String(exception));
    }

    const body: unknown = request.body;
    const question =
      typeof body === 'object' && body !== null && 'question' in body ? requiredText(body.question) : null;
    response
      .status(status)
      .type('html')
      .send(renderPage(ErrorPage({ message, question: question ?? undefined })));
  }
}
