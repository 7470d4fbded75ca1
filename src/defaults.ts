import { Category } from './types';

/**
 * The conventional almanac chain, in walk order.
 */
export const ALMANAC_CATEGORIES: readonly Category[] = [
    'seed',
    'soil',
    'fertilizer',
    'water',
    'light',
    'temperature',
    'humidity',
    'location',
];

export const DEFAULT_TARGET_CATEGORY: Category = 'location';
