import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import { Response } from 'express';
import { IndexNotReadyException } from '../exceptions/rag.exceptions';

export const RETRY_AFTER_SECONDS = 5;

/**
 * Adds `Retry-After` to 503 responses sent while the profile index is building.
 */
@Catch(IndexNotReadyException)
export class IndexNotReadyFilter implements ExceptionFilter<IndexNotReadyException> {
  catch(exception: IndexNotReadyException, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    response
      .status(exception.getStatus())
      .set('Retry-After', String(RETRY_AFTER_SECONDS))
      .json(exception.getResponse());
  }
}
