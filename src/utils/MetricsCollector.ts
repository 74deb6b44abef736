export type MetricLabels = Record<string, string>;

export interface MetricsSnapshot {
    counters: Record<string, number>;
}

function seriesKey(name: string, labels?: MetricLabels): string {
    if (!labels) return name;
    const parts = Object.keys(labels)
        .sort()
        .map(key => `${key}=${labels[key]}`);
    return parts.length > 0 ? `${name}{${parts.join(",")}}` : name;
}

/**
 * In-process counters, keyed by name plus optional labels
 * (`walker_steps{policy=depthFirst}`).
 */
export class MetricsCollector {
    private readonly counters = new Map<string, number>();

    public inc(name: string, labels?: MetricLabels, by: number = 1): void {
        const key = seriesKey(name, labels);
        this.counters.set(key, (this.counters.get(key) ?? 0) + by);
    }

    public get(name: string, labels?: MetricLabels): number {
        return this.counters.get(seriesKey(name, labels)) ?? 0;
    }

    public snapshot(): MetricsSnapshot {
        return { counters: Object.fromEntries(this.counters) };
    }

    public reset(): void {
        this.counters.clear();
    }
}

export const metrics = new MetricsCollector();
