/**
 * Insertion-ordered tally. `mostCommon` sorts by descending count and keeps
 * first-seen order among ties.
 */
export class FrequencyCounter<K> {
  private counts = new Map<K, number>();

  add(key: K, by: number = 1): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + by);
  }

  get(key: K): number {
    return this.counts.get(key) ?? 0;
  }

  get size(): number {
    return this.counts.size;
  }

  mostCommon(limit?: number): Array<[K, number]> {
    const ranked = [...this.counts.entries()].sort((a, b) => b[1] - a[1]);
    return limit === undefined ? ranked : ranked.slice(0, limit);
  }
}
