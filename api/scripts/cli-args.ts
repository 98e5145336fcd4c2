export const USAGE = `Usage: bonus-admin <command>
  bonus-triggers on|off
  discount-triggers on|off
  recalculate-bonuses [--resume] [--batch-size N]
  recalculate-discounts
  consistency [--client ID]`;

export const MAX_BATCH_SIZE = 10_000;

export class UsageError extends Error {
  constructor(problem: string) {
    super(`${problem}\n${USAGE}`);
    this.name = 'UsageError';
  }
}

export const flagValue = (
  args: readonly string[],
  flag: string,
): string | undefined => {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
};

export const parseSwitch = (value: string | undefined): boolean => {
  if (value === 'on') return true;
  if (value === 'off') return false;
  throw new UsageError(`Expected on|off, got "${value ?? ''}"`);
};

/** `--batch-size` is optional; when given it must be 1..10000. */
export const parseBatchSize = (args: readonly string[]): number | undefined => {
  if (!args.includes('--batch-size')) return undefined;
  const raw = flagValue(args, '--batch-size') ?? '';
  const size = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(size) || size < 1 || size > MAX_BATCH_SIZE) {
    throw new UsageError(
      `--batch-size expects an integer from 1 to ${MAX_BATCH_SIZE}, got "${raw}"`,
    );
  }
  return size;
};
