export type PoolSource = () => Promise<string[]>;

/**
 * Ordered image paths still eligible for selection. Entries are removed as
 * they are consumed; `reload` replaces the whole list from `source`.
 */
export class CandidatePool {
  private entries: string[];

  constructor(
    private readonly source: PoolSource,
    initial: string[] = [],
  ) {
    this.entries = [...initial];
  }

  public get size(): number {
    return this.entries.length;
  }

  public at(index: number): string | undefined {
    return this.entries[index];
  }

  public removeAt(index: number) {
    this.entries.splice(index, 1);
  }

  public snapshot(): string[] {
    return [...this.entries];
  }

  public async reload(): Promise<number> {
    this.entries = await this.source();
    return this.entries.length;
  }
}
