/**
 * Per-run cookie store. The platform is a single origin family, so cookies
 * are keyed by name only and domain/path attributes are ignored.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  set(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  get size(): number {
    return this.cookies.size;
  }

  /** Store `Set-Cookie` header values; expired or cleared cookies are dropped. */
  storeSetCookie(headerValues: readonly string[]): void {
    for (const headerValue of headerValues) {
      const [pair = "", ...attributes] = headerValue.split(";");
      const separator = pair.indexOf("=");
      if (separator <= 0) continue;
      const name = pair.slice(0, separator).trim();
      const value = pair.slice(separator + 1).trim();
      const expired = attributes.some((attribute) => /^\s*max-age\s*=\s*(0|-\d+)\s*$/i.test(attribute));
      if (expired || value.length === 0) {
        this.cookies.delete(name);
        continue;
      }
      this.cookies.set(name, value);
    }
  }

  storeFromResponse(response: Response): void {
    const headers = response.headers;
    if (typeof headers.getSetCookie === "function") {
      this.storeSetCookie(headers.getSetCookie());
    }
  }

  /** Value for a `cookie` request header, or undefined when the jar is empty. */
  header(): string | undefined {
    if (this.cookies.size === 0) return undefined;
    return [...this.cookies.entries()].map(([name, value]) => `${name}=${value}`).join("; ");
  }
}
