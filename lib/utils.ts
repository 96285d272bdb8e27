import { clsx, type ClassValue } from 'clsx';
import { twMerge } from 'tailwind-merge';

/**
 * Joins class names; later Tailwind classes override earlier conflicting ones
 */
export function cn(...inputs: ClassValue[]): string {
  return twMerge(clsx(inputs));
}

/**
 * Formats a slider value with one decimal, e.g. "-0.5" or "1.0"
 */
export function formatEffectValue(value: number): string {
  return value.toFixed(1);
}
