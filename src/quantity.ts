/**
 * Parse CPU quantities ('n' nanocores, 'u' microcores, 'm' millicores, or plain cores) into millicores
 */
export function parseCpu(cpu: string | undefined): number {
  if (!cpu) {
    return 0;
  }
  if (cpu.endsWith('n')) {
    return parseFloat(cpu) / 1_000_000;
  } else if (cpu.endsWith('u')) {
    return parseFloat(cpu) / 1000;
  } else if (cpu.endsWith('m')) {
    return parseFloat(cpu);
  }
  return parseFloat(cpu) * 1000;
}

const MEMORY_UNITS: Array<[string, number]> = [
  ['Ki', 1024],
  ['Mi', 1024 ** 2],
  ['Gi', 1024 ** 3],
  ['Ti', 1024 ** 4],
  ['Pi', 1024 ** 5],
  ['Ei', 1024 ** 6],
  ['k', 1000],
  ['K', 1000],
  ['M', 1000 ** 2],
  ['G', 1000 ** 3],
  ['T', 1000 ** 4],
  ['P', 1000 ** 5],
  ['E', 1000 ** 6]
];

/**
 * Parse memory/storage quantities (Ki, Mi, Gi, K, M, G, ...) into bytes
 */
export function parseBytes(quantity: string | undefined): number {
  if (!quantity) {
    return 0;
  }
  // binary suffixes are listed first so 'Mi' never matches as 'M'
  for (const [suffix, multiplier] of MEMORY_UNITS) {
    if (quantity.endsWith(suffix)) {
      return parseFloat(quantity) * multiplier;
    }
  }
  if (quantity.endsWith('m')) {
    return parseFloat(quantity) / 1000;
  }
  return parseFloat(quantity);
}

export const GIB = 1024 ** 3;
