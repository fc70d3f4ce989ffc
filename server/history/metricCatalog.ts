/**
 * Metric Catalog
 *
 * Static per-metric configuration: display unit, reduction and the value
 * domain used to discard sensor noise. Built once per engine and frozen.
 *
 * @module server/history/metricCatalog
 */

import { HistoryConfigError } from './errors';
import type { MetricDefinition, MetricId } from './types';

/** Ids end up inside cache keys, so they are restricted to a safe charset */
const METRIC_ID_PATTERN = /^[A-Za-z][A-Za-z0-9_.-]*$/;

export const DEFAULT_METRIC_CATALOG: readonly MetricDefinition[] = [
    { id: 'heartRate', displayName: 'Heart Rate', displayUnit: 'bpm', reduction: 'mean', validRange: [20, 250] },
    { id: 'restingHeartRate', displayName: 'Resting Heart Rate', displayUnit: 'bpm', reduction: 'mean', validRange: [20, 150] },
    { id: 'hrv', displayName: 'HRV', displayUnit: 'ms', reduction: 'mean', validRange: [1, 300] },
    { id: 'respiratoryRate', displayName: 'Respiratory Rate', displayUnit: 'breaths/min', reduction: 'mean', validRange: [4, 60] },
    { id: 'oxygenSaturation', displayName: 'SpO2', displayUnit: '%', reduction: 'min', validRange: [50, 100] },
    { id: 'bodyTemperature', displayName: 'Temperature', displayUnit: '°C', reduction: 'mean', validRange: [30, 45] },
    { id: 'bloodPressureSystolic', displayName: 'Blood Pressure (systolic)', displayUnit: 'mmHg', reduction: 'max', validRange: [50, 260] },
    { id: 'bloodPressureDiastolic', displayName: 'Blood Pressure (diastolic)', displayUnit: 'mmHg', reduction: 'max', validRange: [30, 180] },
    { id: 'steps', displayName: 'Steps', displayUnit: 'count', reduction: 'sum', validRange: [0, 100_000] },
    { id: 'activeEnergy', displayName: 'Active Energy', displayUnit: 'kcal', reduction: 'sum', validRange: [0, 5_000] },
    { id: 'sleepMinutes', displayName: 'Sleep', displayUnit: 'min', reduction: 'sum', validRange: [0, 1_440] },
    { id: 'sleepStage', displayName: 'Sleep Stage', displayUnit: 'stage', reduction: 'lastValue', validRange: [0, 5] },
    { id: 'stressLevel', displayName: 'Stress', displayUnit: 'score', reduction: 'mean', validRange: [0, 100] },
    { id: 'weight', displayName: 'Weight', displayUnit: 'kg', reduction: 'lastValue', validRange: [1, 500] },
];

/**
 * Validate definitions and index them by id.
 * The returned map and every definition in it are frozen.
 */
export function createMetricCatalog(
    definitions: readonly MetricDefinition[] = DEFAULT_METRIC_CATALOG
): ReadonlyMap<MetricId, MetricDefinition> {
    const catalog = new Map<MetricId, MetricDefinition>();

    for (const definition of definitions) {
        if (!METRIC_ID_PATTERN.test(definition.id)) {
            throw new HistoryConfigError(`Invalid metric id: "${definition.id}"`, { metricId: definition.id });
        }
        if (catalog.has(definition.id)) {
            throw new HistoryConfigError(`Duplicate metric definition: ${definition.id}`, { metricId: definition.id });
        }

        const [low, high] = definition.validRange;
        if (Number.isNaN(low) || Number.isNaN(high) || low > high) {
            throw new HistoryConfigError(
                `Invalid value range for ${definition.id}: [${low}, ${high}]`,
                { metricId: definition.id, low, high }
            );
        }

        catalog.set(definition.id, Object.freeze({
            ...definition,
            validRange: Object.freeze([low, high] as const),
        }));
    }

    return catalog;
}
