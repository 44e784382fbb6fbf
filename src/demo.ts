const AUDIT_STEPS = Array.from({ length: 12 }, (_, i) => `  audit('step ${String(i).padStart(2, '0')}');`);

export const DEMO_OLD_TEXT = [
  'export function total(items: Item[]): number {',
  '  let sum = 0;',
  '  for (const item of items) sum += item.price;',
  ...AUDIT_STEPS,
  '  return sum;',
  '}',
  '',
].join('\n');

export const DEMO_NEW_TEXT = [
  'export function total(items: Item[]): number {',
  '  let   sum = 0;',
  '  for (const item of items) sum += item.price * item.qty;',
  ...AUDIT_STEPS,
  '  return sum;',
  '  // rounding is left to the caller',
  '}',
  '',
].join('\n');

export const DEMO_CONFLICT_TEXT = [
  'export const limits = {',
  '<<<<<<< HEAD',
  '  retries: 3,',
  '=======',
  '  retries: 5,',
  '>>>>>>> feature/retry',
  '  timeoutMs: 1000,',
  '<<<<<<< ours',
  '  backoff: "linear",',
  '||||||| base',
  '  backoff: "none",',
  '=======',
  '  backoff: "exponential",',
  '  jitter: true,',
  '>>>>>>> theirs',
  '};',
  '',
].join('\n');
