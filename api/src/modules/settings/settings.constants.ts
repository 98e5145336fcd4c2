export const SETTING_BONUS_ENABLED = 'bonus_system_enabled';
export const SETTING_BONUS_START_DATE = 'bonus_system_start_date';
export const SETTING_DEFAULT_BONUS_PERCENT = 'default_bonus_percent';
export const SETTING_BONUS_RECALC_CHECKPOINT = 'bonus_recalc_checkpoint';

export const DEFAULT_BONUS_START_DATE = '2025-09-01';

export const hookSettingKey = (hook: string) => `hook.${hook}.enabled`;
