import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { Failure, FailureKind, Result } from '../result';

const EXCEPTION_FOR_KIND: Record<FailureKind, (message: string) => HttpException> =
  {
    validation: (message) => new BadRequestException(message),
    conflict: (message) => new ConflictException(message),
    forbidden: (message) => new ForbiddenException(message),
    not_found: (message) => new NotFoundException(message),
    integrity: (message) => new UnauthorizedException(message),
  };

export function toHttpException(failure: Failure): HttpException {
  return EXCEPTION_FOR_KIND[failure.kind](failure.message);
}

/**
 * Controller-side bridge: successful results become the response body,
 * failures become the matching HTTP exception.
 */
export function unwrapResult<T>(result: Result<T>): {
  message: string;
  data: T;
} {
  if (!result.success) {
    throw toHttpException(result);
  }
  return { message: result.message, data: result.data };
}
