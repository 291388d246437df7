/**
 * URL Utilities
 *
 * The URL set de-duplicates on the exact string, so nothing here rewrites
 * seeds. These helpers only check and resolve.
 */

import psl from 'psl'

/**
 * Validate that a URL is valid and has a supported protocol.
 *
 * @param url - The URL to validate
 * @returns True if valid, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Resolve an href found in a page against the page URL.
 * Returns null for anything that is not an absolute http(s) URL afterwards
 * (mailto:, javascript:, malformed values). The fragment is dropped.
 */
export function resolveHttpUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim()
  if (!trimmed) {
    return null
  }

  let parsed: URL
  try {
    parsed = new URL(trimmed, baseUrl)
  } catch {
    return null
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null
  }

  parsed.hash = ''
  return parsed.toString()
}

/**
 * Extract the registrable domain (eTLD+1) from a URL.
 *
 * Uses the Public Suffix List (psl) library for proper eTLD+1 handling,
 * correctly handling multi-part TLDs like .co.uk, .com.au, etc.
 *
 * @param url - The URL to extract domain from
 * @returns The registrable domain (e.g., "example.com" from "www.example.com")
 */
export function getRegistrableDomain(url: string): string {
  const parsed = new URL(url)
  const hostname = parsed.hostname.toLowerCase()

  const parsedDomain = psl.parse(hostname)

  if (parsedDomain.error) {
    // On parsing error, fall back to hostname
    return hostname
  }

  return parsedDomain.domain || hostname
}
