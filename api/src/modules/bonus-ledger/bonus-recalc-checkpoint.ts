import type { SettingsRepository } from '../../core/database/database.types';
import type { BonusCursor } from '../../core/database/entities';
import { InvalidSettingError } from '../../core/errors/domain.errors';
import { isRecord } from '../../shared/common/input.util';
import { SETTING_BONUS_RECALC_CHECKPOINT } from '../settings/settings.constants';

export type BonusRecalcCheckpoint = {
  cursor: BonusCursor | null;
  processed: number;
  startedAt: string;
};

export const serializeCheckpoint = (checkpoint: BonusRecalcCheckpoint) =>
  JSON.stringify({
    lastDateClose: checkpoint.cursor?.dateClose ?? null,
    lastTransactionId: checkpoint.cursor?.transactionId ?? null,
    processed: checkpoint.processed,
    startedAt: checkpoint.startedAt,
  });

export const parseCheckpoint = (raw: string): BonusRecalcCheckpoint => {
  const invalid = () =>
    new InvalidSettingError(
      SETTING_BONUS_RECALC_CHECKPOINT,
      raw,
      'a recompute checkpoint object',
    );
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw invalid();
  }
  if (!isRecord(parsed)) throw invalid();
  const { lastDateClose, lastTransactionId, processed, startedAt } = parsed;
  if (
    typeof processed !== 'number' ||
    !Number.isSafeInteger(processed) ||
    processed < 0 ||
    typeof startedAt !== 'string'
  ) {
    throw invalid();
  }
  if (lastDateClose === null && lastTransactionId === null) {
    return { cursor: null, processed, startedAt };
  }
  if (typeof lastDateClose !== 'string' || typeof lastTransactionId !== 'string') {
    throw invalid();
  }
  return {
    cursor: { dateClose: lastDateClose, transactionId: lastTransactionId },
    processed,
    startedAt,
  };
};

export const readCheckpoint = async (
  settings: SettingsRepository,
): Promise<BonusRecalcCheckpoint | null> => {
  const stored = await settings.get(SETTING_BONUS_RECALC_CHECKPOINT);
  return stored ? parseCheckpoint(stored.value) : null;
};

export const writeCheckpoint = (
  settings: SettingsRepository,
  checkpoint: BonusRecalcCheckpoint,
) =>
  settings.upsert(
    SETTING_BONUS_RECALC_CHECKPOINT,
    serializeCheckpoint(checkpoint),
    'Progress of the running bonus recompute',
  );
