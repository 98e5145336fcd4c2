import type { SettingsRepository } from '../../core/database/database.types';
import { InvalidSettingError } from '../../core/errors/domain.errors';
import {
  DEFAULT_BONUS_START_DATE,
  SETTING_BONUS_ENABLED,
  SETTING_BONUS_START_DATE,
  SETTING_DEFAULT_BONUS_PERCENT,
} from './settings.constants';

/** Snapshot of the bonus settings, read once per write and handed to the engine. */
export type BonusSystemConfig = {
  enabled: boolean;
  /** Calendar date, `YYYY-MM-DD`. */
  startDate: string;
  /** Stored for operators; the engine earns by each sale's own percent. */
  defaultBonusPercent: string | null;
};

const TRUE_LITERALS = new Set(['t', 'true', 'y', 'yes', 'on', '1']);
const FALSE_LITERALS = new Set(['f', 'false', 'n', 'no', 'off', '0']);
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:[ T].*)?$/;

/** Accepts the literals PostgreSQL takes for `boolean` input. */
export const parseBooleanSetting = (key: string, value: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (TRUE_LITERALS.has(normalized)) return true;
  if (FALSE_LITERALS.has(normalized)) return false;
  throw new InvalidSettingError(key, value, 'a boolean');
};

export const parseDateSetting = (key: string, value: string): string => {
  const match = DATE_PREFIX.exec(value.trim());
  if (!match) throw new InvalidSettingError(key, value, 'a YYYY-MM-DD date');
  const [, year, month, day] = match;
  const probe = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    probe.getUTCFullYear() !== Number(year) ||
    probe.getUTCMonth() !== Number(month) - 1 ||
    probe.getUTCDate() !== Number(day)
  ) {
    throw new InvalidSettingError(key, value, 'an existing calendar date');
  }
  return `${year}-${month}-${day}`;
};

export const buildBonusSystemConfig = (
  values: ReadonlyMap<string, string>,
): BonusSystemConfig => {
  const enabledRaw = values.get(SETTING_BONUS_ENABLED);
  const startRaw = values.get(SETTING_BONUS_START_DATE);
  return {
    enabled:
      enabledRaw === undefined
        ? false
        : parseBooleanSetting(SETTING_BONUS_ENABLED, enabledRaw),
    startDate:
      startRaw === undefined
        ? DEFAULT_BONUS_START_DATE
        : parseDateSetting(SETTING_BONUS_START_DATE, startRaw),
    defaultBonusPercent: values.get(SETTING_DEFAULT_BONUS_PERCENT) ?? null,
  };
};

export const loadBonusSystemConfig = async (
  settings: SettingsRepository,
): Promise<BonusSystemConfig> =>
  buildBonusSystemConfig(
    await settings.getMany([
      SETTING_BONUS_ENABLED,
      SETTING_BONUS_START_DATE,
      SETTING_DEFAULT_BONUS_PERCENT,
    ]),
  );

export const loadBonusStartDate = async (
  settings: SettingsRepository,
): Promise<string> => {
  const stored = await settings.get(SETTING_BONUS_START_DATE);
  return stored
    ? parseDateSetting(SETTING_BONUS_START_DATE, stored.value)
    : DEFAULT_BONUS_START_DATE;
};
