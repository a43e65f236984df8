/**
 * Ordered, immutable list of application names auto-typing must never reach.
 * Matching is a case-insensitive substring test against the foreground app.
 */
export class ExclusionPolicy {
  private readonly entries: readonly string[];
  private readonly needles: readonly string[];

  public constructor(entries: readonly string[]) {
    this.entries = Object.freeze(entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0));
    this.needles = Object.freeze(this.entries.map((entry) => entry.toLowerCase()));
  }

  public list(): readonly string[] {
    return this.entries;
  }

  /** Returns the first entry matching `appName`, if any. */
  public matches(appName: string): string | undefined {
    const haystack = appName.toLowerCase();
    const index = this.needles.findIndex((needle) => haystack.includes(needle));
    return index === -1 ? undefined : this.entries[index];
  }

  public with(entry: string): ExclusionPolicy {
    return new ExclusionPolicy([...this.entries, entry]);
  }

  public without(entry: string): ExclusionPolicy {
    const target = entry.trim().toLowerCase();
    return new ExclusionPolicy(this.entries.filter((item) => item.toLowerCase() !== target));
  }
}
