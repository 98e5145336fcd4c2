import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { AppConfigService } from '../config/app-config.service';
import { getHeader, type RequestLike } from './request-headers';

const TEST_ADMIN_KEYS = new Set(['test-admin-key', 'test_admin_key']);
const PLACEHOLDER_ADMIN_KEYS = new Set(['dev_change_me', 'admin']);

/** Guards operator endpoints (trigger switches, recomputes, adjustments). */
@Injectable()
export class AdminGuard implements CanActivate {
  constructor(private readonly config: AppConfigService) {}

  canActivate(ctx: ExecutionContext): boolean {
    const req = ctx.switchToHttp().getRequest<RequestLike>();
    const key = getHeader(req, 'x-admin-key');
    const want = this.config.getString('ADMIN_KEY') || '';

    if (this.config.isProduction()) {
      if (!want || PLACEHOLDER_ADMIN_KEYS.has(want)) {
        throw new UnauthorizedException(
          'Admin key not properly configured for production',
        );
      }
      if (key === want) return true;
      throw new UnauthorizedException('Missing or invalid admin key');
    }

    // outside production an unset ADMIN_KEY falls back to the test keys
    if (!want) {
      if (TEST_ADMIN_KEYS.has(key)) return true;
      throw new UnauthorizedException('Admin key not configured');
    }
    if (key === want) return true;
    if (this.config.isTest() && TEST_ADMIN_KEYS.has(key)) return true;
    throw new UnauthorizedException('Missing or invalid admin key');
  }
}
