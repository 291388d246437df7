/**
 * City Directory Selectors
 *
 * Directory pages list cities in a grid: a `.row-content` wrapper holding
 * `.row` blocks of `<section>` columns, each a list of city links.
 */

export const SELECTORS = {
  container: 'row-content',
  row: 'row',
  section: 'section',
  link: 'a',
} as const
