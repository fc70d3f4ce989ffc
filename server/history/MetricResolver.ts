/**
 * Metric Resolver
 *
 * Turns caller-supplied metric ids into a canonical, validated list.
 *
 * @module server/history/MetricResolver
 */

import { UnknownMetricError } from './errors';
import type { MetricDefinition, MetricId } from './types';

export class MetricResolver {
    constructor(private readonly catalog: ReadonlyMap<MetricId, MetricDefinition>) {}

    /**
     * Deduplicate and sort (lexicographically) the requested ids.
     * Sorting keeps cache keys independent of the caller's iteration order.
     * Throws UnknownMetricError for the first unregistered id, in sorted order.
     */
    resolve(requestedIds: readonly string[] | ReadonlySet<string>): MetricId[] {
        const resolved = [...new Set(requestedIds)].sort();
        for (const id of resolved) {
            if (!this.catalog.has(id)) {
                throw new UnknownMetricError(id);
            }
        }
        return resolved;
    }

    definitionOf(id: MetricId): MetricDefinition {
        const definition = this.catalog.get(id);
        if (!definition) {
            throw new UnknownMetricError(id);
        }
        return definition;
    }

    /** All known definitions, ordered by id */
    list(): MetricDefinition[] {
        return [...this.catalog.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    }
}
