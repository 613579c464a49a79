// src/modules/auth/auth-exception.filter.ts
import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { AuthError, InvalidJwtError } from './auth.errors';

/**
 * Every AuthError becomes 401 with an empty body.
 * The precise reason goes to the log only, never to the client.
 */
@Catch(AuthError)
export class AuthExceptionFilter implements ExceptionFilter<AuthError> {
  private readonly logger = new Logger(AuthExceptionFilter.name);

  catch(exception: AuthError, host: ArgumentsHost) {
    const reason =
      exception instanceof InvalidJwtError
        ? `${exception.name} <- ${exception.cause.name}`
        : exception.name;
    this.logger.warn(`401: ${reason}`);

    const res = host.switchToHttp().getResponse<Response>();
    res.status(HttpStatus.UNAUTHORIZED).end();
  }
}
