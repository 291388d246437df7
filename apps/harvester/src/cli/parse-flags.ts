export type FlagValue = string | boolean | string[]

/**
 * Parse `--flag value` pairs. Consecutive non-flag tokens are joined with a
 * space; a flag given more than once collects its values in a list.
 */
export function parseFlags(argv: string[]): Record<string, FlagValue> {
  const flags: Record<string, FlagValue> = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === undefined || !token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    for (let next = argv[j]; next !== undefined && !next.startsWith('--'); next = argv[++j]) {
      valueTokens.push(next)
    }

    if (valueTokens.length === 0) {
      flags[key] = true
      continue
    }

    const value = valueTokens.join(' ')
    const existing = flags[key]
    if (Array.isArray(existing)) {
      existing.push(value)
    } else if (typeof existing === 'string') {
      flags[key] = [existing, value]
    } else {
      flags[key] = value
    }
    i = j - 1
  }

  return flags
}

export function asString(value: FlagValue | undefined): string {
  if (Array.isArray(value)) {
    return value[value.length - 1] ?? ''
  }
  return typeof value === 'string' ? value : ''
}

/** Every value of a repeatable flag, split on whitespace and commas. */
export function asList(value: FlagValue | undefined): string[] {
  const raw = Array.isArray(value) ? value : typeof value === 'string' ? [value] : []
  return raw.flatMap(item => item.split(/[\s,]+/)).filter(Boolean)
}

export function asNumber(value: FlagValue | undefined): number | undefined {
  const text = asString(value)
  if (!text) {
    return undefined
  }
  const parsed = Number(text)
  return Number.isFinite(parsed) ? parsed : Number.NaN
}
