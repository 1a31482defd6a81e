export interface Metrics {
  increment(name: string, value?: number, tags?: Record<string, string>): void;
  gauge(name: string, value: number, tags?: Record<string, string>): void;
}

const seriesKey = (name: string, tags?: Record<string, string>): string => {
  if (!tags) return name;
  const parts = Object.keys(tags)
    .sort()
    .map((k) => `${k}=${tags[k]}`);
  return parts.length > 0 ? `${name}{${parts.join(',')}}` : name;
};

export class InMemoryMetrics implements Metrics {
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();

  increment(name: string, value = 1, tags?: Record<string, string>): void {
    const key = seriesKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  gauge(name: string, value: number, tags?: Record<string, string>): void {
    this.gauges.set(seriesKey(name, tags), value);
  }

  counter(name: string, tags?: Record<string, string>): number {
    return this.counters.get(seriesKey(name, tags)) ?? 0;
  }

  snapshot(): { counters: Record<string, number>; gauges: Record<string, number> } {
    return {
      counters: Object.fromEntries(this.counters.entries()),
      gauges: Object.fromEntries(this.gauges.entries())
    };
  }
}
