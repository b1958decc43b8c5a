import { performance } from 'perf_hooks';

export function processMillis(): number {
  return performance.now();
}

export function plural(count: number, singular: string, pluralForm = singular + 's'): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}
