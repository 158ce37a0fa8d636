import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Inject,
  Injectable,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { DateTime } from 'luxon';

import { INJECTION_TOKENS } from '../../../../common/constants/injection-tokens';
import { Clock } from '../../../../common/time/clock';
import { renderErrorFragment } from '../views/fragments';

const FRAGMENT_LABELS: Record<string, string> = {
  '/data/profile': 'company profile',
  '/data/news': 'news',
};

/**
 * htmx does not swap 4xx responses, so a rejected query would leave a panel
 * stale. Validation errors on fragment routes are answered with the error
 * fragment and 200 instead.
 */
@Injectable()
@Catch(BadRequestException)
export class FragmentValidationFilter implements ExceptionFilter<BadRequestException> {
  constructor(@Inject(INJECTION_TOKENS.CLOCK) private readonly clock: Clock) {}

  catch(exception: BadRequestException, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const label = FRAGMENT_LABELS[request.path] ?? 'dashboard';
    const updatedAt = DateTime.fromMillis(this.clock.now()).toFormat('HH:mm:ss');

    response
      .status(HttpStatus.OK)
      .type('html')
      .send(renderErrorFragment(label, validationMessage(exception), updatedAt));
  }
}

/**
 * ValidationPipe puts the constraint messages in `message` as an array.
 */
function validationMessage(exception: BadRequestException): string {
  const body: unknown = exception.getResponse();
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return exception.message;
}
