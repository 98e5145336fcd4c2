import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
  type StoreSession,
} from '../../core/database/database.types';
import type { SettingRecord } from '../../core/database/entities';
import { logEvent } from '../../shared/logging/event-log.util';

/**
 * Key/value settings table. Values stay raw text; callers coerce and default
 * them (see bonus-config.ts). Every method joins the caller's session when one
 * is given, otherwise runs in its own transaction.
 */
@Injectable()
export class SystemSettingsService {
  private readonly logger = new Logger(SystemSettingsService.name);

  constructor(@Inject(DATA_STORE) private readonly store: DataStore) {}

  async get(key: string, session?: StoreSession): Promise<string | null> {
    const record = await this.getRecord(key, session);
    return record?.value ?? null;
  }

  getRecord(key: string, session?: StoreSession): Promise<SettingRecord | null> {
    return this.run(session, (s) => s.settings.get(key));
  }

  async set(
    key: string,
    value: string,
    description: string | null = null,
    session?: StoreSession,
  ): Promise<SettingRecord> {
    const record = await this.run(session, async (s) => {
      await s.settings.upsert(key, value, description);
      const saved = await s.settings.get(key);
      if (!saved) throw new Error(`Setting "${key}" vanished after upsert`);
      return saved;
    });
    logEvent(this.logger, 'settings.updated', { key, value });
    return record;
  }

  private run<T>(
    session: StoreSession | undefined,
    action: (session: StoreSession) => Promise<T>,
  ): Promise<T> {
    return session ? action(session) : this.store.transaction(action);
  }
}
