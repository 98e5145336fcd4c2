import {
  Controller,
  Get,
  Header,
  Inject,
  Logger,
  Req,
  UnauthorizedException,
} from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { MetricsService } from './metrics.service';
import { AppConfigService } from '../config/app-config.service';
import { DATA_STORE, type DataStore } from '../database/database.types';
import type { EngineName } from '../database/entities';
import { getHeader, type RequestLike } from '../guards/request-headers';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';

const ENGINES: readonly EngineName[] = ['bonus', 'discount'];

@ApiExcludeController()
@Controller()
export class MetricsController {
  private readonly logger = new Logger(MetricsController.name);

  constructor(
    private readonly metrics: MetricsService,
    private readonly config: AppConfigService,
    @Inject(DATA_STORE) private readonly store: DataStore,
  ) {}

  @Get('metrics')
  @Header('Content-Type', 'text/plain; version=0.0.4')
  async metricsEndpoint(@Req() req: RequestLike): Promise<string> {
    this.authorize(req);
    await this.refreshFailureBacklog();
    return this.metrics.exportProm();
  }

  /** METRICS_TOKEN is mandatory in production, optional elsewhere. */
  private authorize(req: RequestLike) {
    const token = this.config.getString('METRICS_TOKEN', '') ?? '';
    if (!token) {
      if (this.config.isProduction()) {
        throw new UnauthorizedException('Metrics token required');
      }
      return;
    }
    const auth = getHeader(req, 'authorization');
    const bearer = auth.startsWith('Bearer ') ? auth.slice('Bearer '.length) : '';
    if (getHeader(req, 'x-metrics-token') !== token && bearer !== token) {
      throw new UnauthorizedException('Metrics token required');
    }
  }

  private async refreshFailureBacklog() {
    try {
      const open = await this.store.transaction((session) =>
        session.failures.countUnresolved(),
      );
      for (const engine of ENGINES) {
        this.metrics.setGauge('engine_failures_open', open.get(engine) ?? 0, {
          engine,
        });
      }
    } catch (err) {
      logIgnoredError(err, 'MetricsController failure backlog', this.logger);
    }
  }
}
