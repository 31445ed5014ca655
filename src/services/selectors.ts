// LinkedIn DOM hooks. Lists are tried in order; LinkedIn ships several
// layouts side by side, so older selectors stay until they stop matching.
export const SELECTORS = {
  locationInputs: [
    "input[aria-label='City, state, or zip code']",
    "input[aria-label='Location']",
    "input[placeholder*='Location']",
  ],
  locationClearButtons: [
    "button[aria-label='Clear location']",
    "button[aria-label='Clear']",
    "button[aria-label='Clear search']",
  ],
  locationSuggestions: "ul[role='listbox'] li, div[role='listbox'] li",
  easyApplyCheckbox: "label:has-text('Easy Apply') input[type='checkbox']",

  jobCardLists: [
    'ul.jobs-search-results__list li',
    'li.scaffold-layout__list-item',
    'li[data-occludable-job-id]',
  ],
  resultsContainer: 'div.jobs-search-results-list',
  jobTitle: ['.jobs-unified-top-card__job-title', 'h1', 'h2'],
  jobCompany: [
    '.jobs-unified-top-card__company-name',
    '.job-details-jobs-unified-top-card__company-name',
    "a[data-control-name='company_link']",
  ],
  easyApplyButton: "button:has-text('Easy Apply')",

  modal: "div[role='dialog']",
  submitButton: "button:has-text('Submit')",
  reviewButton: "button:has-text('Review')",
  nextButton: "button:has-text('Next')",
  doneButton: "button:has-text('Done')",
  validationError: '.artdeco-inline-feedback__message',
  textFields:
    "input[type='text'], input[type='tel'], input[type='email'], input[type='number'], input:not([type]), textarea",
  selectFields: 'select',
  radioGroups: 'fieldset',
} as const;
