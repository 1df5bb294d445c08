/**
 * List Routing
 *
 * Picks a destination list for a new reminder when the caller names none,
 * by scoring word overlap between the reminder text and each list title.
 */

import type { ReminderList } from '../types/models.js';

const FALLBACK_LIST_NAMES: readonly string[] = ['reminders', 'inbox', 'todo', 'todos', 'tareas'];

// Substrings that mark a shopping list, and words that mark a purchase.
const SHOPPING_LIST_MARKERS: readonly string[] = [
  'compr',
  'shop',
  'groc',
  'super',
  'market',
  'tienda',
  'store',
];
const SHOPPING_TERMS: readonly string[] = [
  'compr',
  'buy',
  'milk',
  'pan',
  'agua',
  'coca',
  'cola',
  'super',
  'market',
  'grocery',
];

const TOKEN_OVERLAP_WEIGHT = 20;
const PREFIX_OVERLAP_WEIGHT = 12;
const CONTAINS_BONUS = 20;
const THEME_BONUS = 24;
const FALLBACK_BONUS = 1;
const MIN_SHARED_PREFIX = 4;

/**
 * Lower-cased alphanumeric words of two or more characters
 */
export function tokenize(value: string): Set<string> {
  return new Set(
    value
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((part) => [...part].length >= 2)
  );
}

function sharedPrefixLength(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  let length = 0;
  while (length < left.length && length < right.length && left[length] === right[length]) {
    length++;
  }
  return length;
}

function themeBonus(listName: string, text: string): number {
  const isShoppingList = SHOPPING_LIST_MARKERS.some((marker) => listName.includes(marker));
  const isPurchase = SHOPPING_TERMS.some((term) => text.includes(term));
  return isShoppingList && isPurchase ? THEME_BONUS : 0;
}

function isFallbackName(name: string): boolean {
  return FALLBACK_LIST_NAMES.includes(name.toLowerCase());
}

/**
 * Score one list against the reminder text
 */
export function scoreList(list: ReminderList, text: string, textTokens: Set<string>): number {
  const name = list.title.toLowerCase();
  const nameTokens = tokenize(name);

  let overlap = 0;
  let prefixOverlap = 0;
  for (const token of textTokens) {
    if (nameTokens.has(token)) {
      overlap++;
    }
    for (const nameToken of nameTokens) {
      if (sharedPrefixLength(token, nameToken) >= MIN_SHARED_PREFIX) {
        prefixOverlap++;
        break;
      }
    }
  }

  const contains = name.length > 0 && text.includes(name) ? CONTAINS_BONUS : 0;
  const fallback = isFallbackName(name) ? FALLBACK_BONUS : 0;

  return (
    overlap * TOKEN_OVERLAP_WEIGHT +
    prefixOverlap * PREFIX_OVERLAP_WEIGHT +
    contains +
    themeBonus(name, text) +
    fallback
  );
}

/**
 * Choose the list title a new reminder should go to
 * @returns null when there are no lists
 */
export function inferBestListName(
  lists: ReminderList[],
  title: string,
  notes?: string
): string | null {
  if (lists.length === 0) {
    return null;
  }

  const text = `${title} ${notes ?? ''}`.toLowerCase();
  const textTokens = tokenize(text);

  let best: ReminderList | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const list of lists) {
    const score = scoreList(list, text, textTokens);
    // Ties keep the earlier list.
    if (score > bestScore) {
      best = list;
      bestScore = score;
    }
  }

  if (best && bestScore > FALLBACK_BONUS) {
    return best.title;
  }

  const fallback = lists.find((list) => isFallbackName(list.title));
  return (fallback ?? lists[0]).title;
}
