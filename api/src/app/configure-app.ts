import { ValidationPipe, type INestApplication } from '@nestjs/common';
import { HttpErrorFilter } from '../core/filters/http-error.filter';
import { HttpMetricsInterceptor } from '../core/interceptors/http-metrics.interceptor';
import { DomainErrorInterceptor } from '../core/interceptors/domain-error.interceptor';
import { MetricsService } from '../core/metrics/metrics.service';

/** Pipes, filters and interceptors shared by the server and the e2e tests. */
export function configureApp(app: INestApplication) {
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalInterceptors(
    new HttpMetricsInterceptor(app.get(MetricsService)),
    new DomainErrorInterceptor(),
  );
  app.useGlobalFilters(new HttpErrorFilter());
}
