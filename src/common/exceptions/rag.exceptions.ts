import {
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  ServiceUnavailableException,
} from '@nestjs/common';

/**
 * Stable machine-readable codes returned in the `error` field of every
 * pipeline failure response.
 */
export enum RagErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  INDEX_NOT_READY = 'INDEX_NOT_READY',
  EMBEDDING_UNAVAILABLE = 'EMBEDDING_UNAVAILABLE',
  GENERATION_UNAVAILABLE = 'GENERATION_UNAVAILABLE',
  INDEX_BUILD_FAILED = 'INDEX_BUILD_FAILED',
}

export interface RagErrorBody {
  statusCode: number;
  error: RagErrorCode;
  message: string;
}

function body(statusCode: number, error: RagErrorCode, message: string): RagErrorBody {
  return { statusCode, error, message };
}

/** Returns the pipeline error code carried by an exception, if any. */
export function ragErrorCodeOf(exception: unknown): RagErrorCode | undefined {
  if (!(exception instanceof HttpException)) {
    return undefined;
  }
  const response = exception.getResponse();
  if (typeof response === 'object' && response !== null && 'error' in response) {
    const code = response.error;
    return Object.values(RagErrorCode).find((value) => value === code);
  }
  return undefined;
}

export class InvalidInputException extends BadRequestException {
  constructor(message = 'Question must be a non-empty string.') {
    super(body(400, RagErrorCode.INVALID_INPUT, message));
  }
}

export class IndexNotReadyException extends ServiceUnavailableException {
  constructor() {
    super(body(503, RagErrorCode.INDEX_NOT_READY, 'The profile index is not ready yet. Please retry shortly.'));
  }
}

/**
 * The `reason` stays server-side (logs, `cause`); clients only see the fixed message.
 */
export class EmbeddingUnavailableException extends ServiceUnavailableException {
  constructor(readonly reason: string, cause?: unknown) {
    super(body(503, RagErrorCode.EMBEDDING_UNAVAILABLE, 'The embedding service is temporarily unavailable.'), {
      cause,
      description: reason,
    });
  }
}

export class GenerationUnavailableException extends ServiceUnavailableException {
  constructor(readonly reason: string, cause?: unknown) {
    super(body(503, RagErrorCode.GENERATION_UNAVAILABLE, 'The answer service is temporarily unavailable.'), {
      cause,
      description: reason,
    });
  }
}

export class IndexBuildException extends InternalServerErrorException {
  constructor(readonly reason: string, cause?: unknown) {
    super(body(500, RagErrorCode.INDEX_BUILD_FAILED, 'The profile index could not be built.'), {
      cause,
      description: reason,
    });
  }
}
