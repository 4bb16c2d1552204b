/**
 * Registrable domain for display and policy lookups:
 * "https://www.example.com/p?x=1" → "example.com".
 * Never throws; unparseable input yields "Unknown".
 */
export function extractRegistrableDomain(url: string): string {
  try {
    const host = new URL(url).host;
    if (!host) return 'Unknown';
    return host.replace(/^www\./i, '');
  } catch {
    return 'Unknown';
  }
}

/** Lowercased hostname without "www.", or null when the URL does not parse. */
export function hostnameOf(url: string): string | null {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host ? host.replace(/^www\./, '') : null;
  } catch {
    return null;
  }
}
