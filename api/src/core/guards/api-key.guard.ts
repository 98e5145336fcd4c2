import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getHeader, type RequestLike } from './request-headers';

/** Guards the sales write path and the bot read endpoint. */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(ctx: ExecutionContext): boolean {
    const req = ctx.switchToHttp().getRequest<RequestLike>();
    const apiKey = this.readApiKey(req);

    const rawConfigured = this.configService.get<string>('API_KEY');
    const configuredKey =
      rawConfigured && rawConfigured.trim().length > 0
        ? rawConfigured.trim()
        : undefined;

    if (this.configService.get<string>('NODE_ENV') === 'production') {
      if (
        !configuredKey ||
        configuredKey === 'dev-api-key' ||
        configuredKey.length < 32
      ) {
        throw new UnauthorizedException(
          'API key not properly configured for production',
        );
      }
      if (apiKey === configuredKey) return true;
      throw new UnauthorizedException('Invalid API key');
    }

    // Non-production: настроенный ключ или 'test-key'
    const allowedKeys = new Set<string>(['test-key']);
    if (configuredKey) allowedKeys.add(configuredKey);
    if (allowedKeys.has(apiKey)) return true;
    throw new UnauthorizedException('Invalid API key');
  }

  private readApiKey(req: RequestLike): string {
    const headerKey = getHeader(req, 'x-api-key');
    const bearer = getHeader(req, 'authorization');
    const bearerToken = bearer.startsWith('Bearer ')
      ? bearer.slice('Bearer '.length)
      : '';
    return (headerKey || bearerToken).trim();
  }
}
