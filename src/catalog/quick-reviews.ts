/** Quick-review keys stored on readings, with their display labels. */
const QUICK_REVIEWS: Record<string, string> = {
  "loved-it": "Loved it",
  "page-turner": "Page-turner",
  "thought-provoking": "Thought-provoking",
  "couldnt-put-down": "Couldn't put down",
  "great-characters": "Great characters",
  funny: "Funny",
  moving: "Moving",
  "laughed-out-loud": "Laughed out loud",
  relatable: "Relatable",
  "quick-read": "Quick read",
  "slow-burn": "Slow burn",
  dense: "Dense",
  "predictable-plot": "Predictable plot",
  "disappointing-ending": "Disappointing ending",
  "unrelatable-characters": "Unrelatable characters",
  forgettable: "Forgettable",
  "too-long": "Too long",
  "odd-pov": "Odd POV",
  overrated: "Overrated",
};

export function isQuickReview(value: string): boolean {
  return Object.hasOwn(QUICK_REVIEWS, value);
}

export function quickReviewLabel(value: string): string {
  return QUICK_REVIEWS[value] ?? value;
}
