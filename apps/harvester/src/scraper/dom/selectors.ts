/**
 * Selector builders shared by the document handle implementations.
 */

function quoteAttributeValue(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

/** Matches elements carrying the class token. Works for names that are not valid CSS identifiers. */
export function classSelector(className: string): string {
  return `[class~=${quoteAttributeValue(className.trim())}]`
}

/** Tag selectors are lowercase and alphanumeric (plus '-' for custom elements). */
export function tagSelector(tagName: string): string {
  const tag = tagName.trim().toLowerCase()
  if (!/^[a-z][a-z0-9-]*$/.test(tag)) {
    throw new Error(`Invalid tag name: ${tagName}`)
  }
  return tag
}
