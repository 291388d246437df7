export const SELECTORS = {
  title: 'title',
  fallbackTitle: 'h1',
} as const
