/**
 * Clarifying questions and outcome messages shown to the user (Russian, like the catalog)
 */

import type { ClarifyQuery } from '../query/recommendation-query.schema.js';

export type ClarifyReason = 'vague_intent' | 'missing_location';

export const DEFAULT_CLARIFYING_QUESTION =
  'Подскажи, какой отдых тебе интересен? Например: кафе или ресторан, культурное место (музей, театр), активный отдых или что-то ещё?';

export const LOCATION_CLARIFYING_QUESTION =
  'Чтобы искать места рядом с тобой, мне нужна твоя геолокация. Поделись ей или назови район.';

export const NO_MATCHES_MESSAGE = 'Ничего не нашлось. Попробуй изменить запрос или расширить радиус поиска.';

export const INSUFFICIENT_MATCHES_MESSAGE = 'Нашлось совсем немного мест. Можно ослабить критерии, чтобы увидеть больше вариантов.';

/**
 * Question for a clarify turn; the upstream suggestion wins when present
 */
export function resolveClarifyingQuestion(query: ClarifyQuery | null, reason: ClarifyReason): string {
  const suggested = query?.question?.trim();
  if (suggested) {
    return suggested;
  }
  return reason === 'missing_location' ? LOCATION_CLARIFYING_QUESTION : DEFAULT_CLARIFYING_QUESTION;
}
