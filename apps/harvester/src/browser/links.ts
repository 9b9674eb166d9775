/**
 * Resolve href values read from `baseUrl` to absolute URLs, in order.
 * Missing, empty and fragment-only values are skipped.
 */
export function resolveLinks(hrefs: ReadonlyArray<string | null>, baseUrl: string): string[] {
  const links: string[] = []
  for (const href of hrefs) {
    const trimmed = href?.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    try {
      links.push(new URL(trimmed, baseUrl).toString())
    } catch (error) {
      if (!(error instanceof TypeError)) throw error
      // Unparseable href: not a link
    }
  }
  return links
}
