/**
 * 🎨 Class Name Utility
 *
 * clsx for conditional classes, tailwind-merge so later Tailwind classes win
 * over conflicting earlier ones.
 *
 * ```tsx
 * cn('px-4 py-2', isActive && 'bg-primary', className)
 * cn('p-4', 'p-2') // => 'p-2'
 * ```
 *
 * @module lib/utils/cn
 */

import { type ClassValue, clsx } from 'clsx';
import { twMerge } from 'tailwind-merge';

export function cn(...inputs: ClassValue[]): string {
  return twMerge(clsx(inputs));
}
