import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { MetricsService } from '../metrics/metrics.service';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';

type HttpRequest = {
  method?: string;
  route?: { path?: string };
  path?: string;
  originalUrl?: string;
};

type HttpResponse = {
  statusCode?: number;
};

@Injectable()
export class HttpMetricsInterceptor implements NestInterceptor {
  constructor(private readonly metrics: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const started = process.hrtime.bigint();
    const http = context.switchToHttp();
    const req = http.getRequest<HttpRequest>();
    const res = http.getResponse<HttpResponse>();
    const method: string = req.method || 'GET';
    // route pattern, not the raw URL, to keep label cardinality bounded
    const route: string =
      req.route?.path || req.path || req.originalUrl || 'unknown';

    const record = (status: number) => {
      try {
        const seconds = Number(process.hrtime.bigint() - started) / 1e9;
        this.metrics.recordHttp(method, route, status, seconds);
      } catch (err) {
        logIgnoredError(err, 'HttpMetricsInterceptor record', undefined, 'debug');
      }
    };

    return next.handle().pipe(
      tap(() => {
        record(typeof res.statusCode === 'number' ? res.statusCode : 200);
      }),
      catchError((err: unknown) => {
        record(this.statusOf(err));
        return throwError(() => err);
      }),
    );
  }

  private statusOf(err: unknown): number {
    if (err && typeof err === 'object' && 'getStatus' in err) {
      const getStatus = err.getStatus;
      if (typeof getStatus === 'function') {
        const status: unknown = getStatus.call(err);
        if (typeof status === 'number') return status;
      }
    }
    return 500;
  }
}
