import { ConfigError } from '@docvault/shared';

/** commander argument parser for integer options with a lower bound */
export function integerOption(flag: string, min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < min) {
      throw new ConfigError(`${flag} must be an integer of at least ${min}, got "${value}"`);
    }
    return parsed;
  };
}
