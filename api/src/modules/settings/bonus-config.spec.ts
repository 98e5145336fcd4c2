import type { SettingsRepository } from '../../core/database/database.types';
import { InvalidSettingError } from '../../core/errors/domain.errors';
import {
  buildBonusSystemConfig,
  loadBonusStartDate,
  parseBooleanSetting,
  parseDateSetting,
} from './bonus-config';

const settingsWith = (values: Record<string, string>): SettingsRepository => ({
  get: jest.fn(async (key: string) =>
    key in values
      ? {
          key,
          value: values[key],
          description: null,
          createdAt: '2025-09-01 00:00:00',
          updatedAt: '2025-09-01 00:00:00',
        }
      : null,
  ),
  getMany: jest.fn(async (keys: readonly string[]) => {
    const found = new Map<string, string>();
    for (const key of keys) if (key in values) found.set(key, values[key]);
    return found;
  }),
  upsert: jest.fn(async () => undefined),
  delete: jest.fn(async () => false),
});

describe('bonus settings', () => {
  it('parses the boolean literals PostgreSQL accepts', () => {
    expect(parseBooleanSetting('k', ' TRUE ')).toBe(true);
    expect(parseBooleanSetting('k', 't')).toBe(true);
    expect(parseBooleanSetting('k', 'off')).toBe(false);
    expect(parseBooleanSetting('k', '0')).toBe(false);
    expect(() => parseBooleanSetting('k', 'maybe')).toThrow(InvalidSettingError);
  });

  it('keeps only the calendar date of a start date', () => {
    expect(parseDateSetting('k', '2025-09-01')).toBe('2025-09-01');
    expect(parseDateSetting('k', '2025-09-01 00:00:00')).toBe('2025-09-01');
    expect(() => parseDateSetting('k', '2025-02-30')).toThrow(InvalidSettingError);
    expect(() => parseDateSetting('k', 'tomorrow')).toThrow(InvalidSettingError);
  });

  it('defaults to disabled with the 2025-09-01 start date', () => {
    expect(buildBonusSystemConfig(new Map())).toEqual({
      enabled: false,
      startDate: '2025-09-01',
      defaultBonusPercent: null,
    });
  });

  it('builds the config from stored values', () => {
    const config = buildBonusSystemConfig(
      new Map([
        ['bonus_system_enabled', 'true'],
        ['bonus_system_start_date', '2025-10-15'],
        ['default_bonus_percent', '5.0'],
      ]),
    );
    expect(config).toEqual({
      enabled: true,
      startDate: '2025-10-15',
      defaultBonusPercent: '5.0',
    });
  });

  it('loadBonusStartDate falls back when the setting is absent', async () => {
    await expect(loadBonusStartDate(settingsWith({}))).resolves.toBe('2025-09-01');
    await expect(
      loadBonusStartDate(settingsWith({ bonus_system_start_date: '2025-11-01' })),
    ).resolves.toBe('2025-11-01');
  });
});
