import { ArgumentsHost, Catch, ExceptionFilter, Logger, NotFoundException } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { Notice } from '../../views/notice';
import { renderFragments } from '../../views/render';

/** Answers 404s on HTMX routes with a notice fragment the page swaps into its flash area. */
@Catch(NotFoundException)
export class HtmxNotFoundFilter implements ExceptionFilter {
  private readonly logger = new Logger(HtmxNotFoundFilter.name);

  catch(exception: NotFoundException, host: ArgumentsHost) {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    this.logger.warn(exception.message);
    reply
      .status(404)
      .header('Content-Type', 'text/html; charset=utf-8')
      .send(renderFragments(<Notice message={exception.message} />));
  }
}
