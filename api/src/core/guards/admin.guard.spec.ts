import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AppConfigService } from '../config/app-config.service';
import { AdminGuard } from './admin.guard';
import type { RequestLike } from './request-headers';

const createContext = (req: RequestLike): ExecutionContext =>
  ({
    switchToHttp: () => ({
      getRequest: () => req,
    }),
  }) as ExecutionContext;

const withKey = (key?: string) =>
  createContext({ headers: key === undefined ? {} : { 'x-admin-key': key } });

describe('AdminGuard', () => {
  const origEnv = { ...process.env };
  const guard = new AdminGuard(new AppConfigService());

  afterEach(() => {
    process.env = { ...origEnv };
  });

  it('accepts the configured key', () => {
    process.env.ADMIN_KEY = 'test-secret';
    expect(guard.canActivate(withKey('test-secret'))).toBe(true);
  });

  it('accepts the test keys while running tests', () => {
    process.env.ADMIN_KEY = 'test-secret';
    expect(guard.canActivate(withKey('test-admin-key'))).toBe(true);
  });

  it('rejects a missing key', () => {
    process.env.ADMIN_KEY = 'test-secret';
    expect(() => guard.canActivate(withKey())).toThrow(UnauthorizedException);
  });

  it('rejects a placeholder key in production', () => {
    process.env.NODE_ENV = 'production';
    process.env.ADMIN_KEY = 'admin';
    expect(() => guard.canActivate(withKey('admin'))).toThrow(
      'Admin key not properly configured for production',
    );
  });

  it('does not take the test keys in production', () => {
    process.env.NODE_ENV = 'production';
    process.env.ADMIN_KEY = 'test-secret';
    expect(() => guard.canActivate(withKey('test-admin-key'))).toThrow(
      'Missing or invalid admin key',
    );
    expect(guard.canActivate(withKey('test-secret'))).toBe(true);
  });
});
