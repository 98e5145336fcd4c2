import {
  BadRequestException,
  CallHandler,
  ExecutionContext,
  ConflictException,
  HttpException,
  Injectable,
  NestInterceptor,
  NotFoundException,
} from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { catchError } from 'rxjs/operators';
import { DomainError } from '../errors/domain.errors';

export const toHttpException = (err: DomainError): HttpException => {
  switch (err.kind) {
    case 'not_found':
      return new NotFoundException(err.message);
    case 'conflict':
      return new ConflictException(err.message);
    case 'invalid':
      return new BadRequestException(err.message);
  }
};

/** Maps domain errors thrown by services onto Nest HTTP exceptions. */
@Injectable()
export class DomainErrorInterceptor implements NestInterceptor {
  intercept(_context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next
      .handle()
      .pipe(
        catchError((err: unknown) =>
          throwError(() =>
            err instanceof DomainError ? toHttpException(err) : err,
          ),
        ),
      );
  }
}
