import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
  type StoreSession,
} from '../../core/database/database.types';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';
import { logEvent } from '../../shared/logging/event-log.util';
import {
  loadBonusSystemConfig,
  parseBooleanSetting,
  type BonusSystemConfig,
} from '../settings/bonus-config';
import { hookSettingKey } from '../settings/settings.constants';
import {
  HOOK_NAMES,
  type HookContext,
  type HookName,
  type HookStatus,
  type SalesEvent,
  type TransactionHook,
} from './hook.types';

/**
 * Synchronous in-transaction dispatcher for sales writes. Handlers run inside
 * the session of the write that published the event, so a handler error
 * aborts that write unless the handler contains it. Publishing holds the
 * switch lock shared until the write commits; flipping a switch waits for
 * those writes.
 */
@Injectable()
export class TransactionHooksService {
  private readonly logger = new Logger(TransactionHooksService.name);
  private readonly hooks = new Map<HookName, TransactionHook>();

  constructor(@Inject(DATA_STORE) private readonly store: DataStore) {}

  register(hook: TransactionHook) {
    if (this.hooks.has(hook.name)) {
      throw new Error(`Hook ${hook.name} is already registered`);
    }
    this.hooks.set(hook.name, hook);
  }

  async publish(session: StoreSession, event: SalesEvent): Promise<void> {
    const candidates = [...this.hooks.values()]
      .filter((hook) => hook.matches(event))
      .sort((a, b) => a.priority - b.priority);
    if (!candidates.length) return;
    await session.lockHookSwitches('shared');
    const enabled = await this.readEnabled(
      session,
      candidates.map((hook) => hook.name),
    );
    const context = this.createContext(session);
    for (const hook of candidates) {
      if (!enabled.get(hook.name)) continue;
      await hook.handle(session, event, context);
    }
  }

  async isEnabled(name: HookName, session?: StoreSession): Promise<boolean> {
    const read = (s: StoreSession) => this.readEnabled(s, [name]);
    const flags = session ? await read(session) : await this.store.transaction(read);
    return flags.get(name) ?? true;
  }

  async setEnabled(
    name: HookName,
    enabled: boolean,
    session?: StoreSession,
  ): Promise<void> {
    const write = async (s: StoreSession) => {
      await s.lockHookSwitches('exclusive');
      await s.settings.upsert(
        hookSettingKey(name),
        enabled ? 'true' : 'false',
        `Automatic ${name} hook switch`,
      );
    };
    if (session) await write(session);
    else await this.store.transaction(write);
    logEvent(this.logger, 'hooks.toggled', { hook: name, enabled });
  }

  async list(): Promise<HookStatus[]> {
    const flags = await this.store.transaction((s) =>
      this.readEnabled(s, HOOK_NAMES),
    );
    return HOOK_NAMES.map((name) => ({
      name,
      enabled: flags.get(name) ?? true,
      registered: this.hooks.has(name),
    }));
  }

  private async readEnabled(
    session: StoreSession,
    names: readonly HookName[],
  ): Promise<Map<HookName, boolean>> {
    const stored = await session.settings.getMany(names.map(hookSettingKey));
    const flags = new Map<HookName, boolean>();
    for (const name of names) {
      const key = hookSettingKey(name);
      const raw = stored.get(key);
      let enabled = true;
      if (raw !== undefined) {
        try {
          enabled = parseBooleanSetting(key, raw);
        } catch (err) {
          logIgnoredError(err, `hook ${name} switch unreadable`, this.logger);
        }
      }
      flags.set(name, enabled);
    }
    return flags;
  }

  private createContext(session: StoreSession): HookContext {
    let pending: Promise<BonusSystemConfig> | null = null;
    return {
      bonusConfig: () => {
        pending ??= loadBonusSystemConfig(session.settings);
        return pending;
      },
    };
  }
}
