import { InvalidArgumentError } from 'commander';

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

export function reportError(error: unknown): never {
  if (error instanceof Error) {
    console.error(`\n❌ ${error.name}: ${error.message}`);
  } else {
    console.error('\n❌ Unknown error occurred');
  }
  process.exit(1);
}
