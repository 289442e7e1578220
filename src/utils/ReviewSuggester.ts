/**
 * Events that decide when to ask the user for an App Store review.
 */
export type ReviewEvent = 'sessionStart' | 'trouble';

export interface ReviewSuggester {
  registerEvent(event: ReviewEvent): void;
}
