/**
 * Chart configuration - caller options merged over defaults
 * The resulting configuration is shared read-only by everything drawing the chart
 */

import { ConfigurationError } from '../errors.js';
import { strings } from '../strings.js';
import {
    ChartConfiguration,
    ChartLabels,
    LAYOUT_ORIENTATIONS,
    LayoutOrientation,
    TextDirection
} from '../types.js';

export const MIN_GENERATIONS = 1;
export const MAX_GENERATIONS = 25;

export interface ChartOptions {
    textDirection: TextDirection;
    labels: Partial<ChartLabels>;
    treeLayout: LayoutOrientation;
    generations: number;
    assetBaseUrl: string;
}

export const DEFAULT_CHART_OPTIONS: Omit<ChartOptions, 'labels'> = {
    textDirection: 'ltr',
    treeLayout: 'left-right',
    generations: 4,
    assetBaseUrl: ''
};

function defaultLabels(): ChartLabels {
    return {
        zoom: strings.chart.zoomHint,
        move: strings.chart.moveHint
    };
}

/**
 * Build the chart configuration. Labels default to the active language.
 */
export function createConfiguration(options: Partial<ChartOptions> = {}): ChartConfiguration {
    // Merge with defaults
    const merged = { ...DEFAULT_CHART_OPTIONS, ...options };

    if (!Number.isInteger(merged.generations)
        || merged.generations < MIN_GENERATIONS
        || merged.generations > MAX_GENERATIONS
    ) {
        throw new ConfigurationError(
            `Generations must be an integer between ${MIN_GENERATIONS} and ${MAX_GENERATIONS}, got ${merged.generations}`
        );
    }

    if (!LAYOUT_ORIENTATIONS.includes(merged.treeLayout)) {
        throw new ConfigurationError(`Unknown tree layout: "${merged.treeLayout}"`);
    }

    if (merged.textDirection !== 'ltr' && merged.textDirection !== 'rtl') {
        throw new ConfigurationError(`Unknown text direction: "${merged.textDirection}"`);
    }

    return Object.freeze({
        rtl: merged.textDirection === 'rtl',
        labels: Object.freeze({ ...defaultLabels(), ...options.labels }),
        treeLayout: merged.treeLayout,
        generations: merged.generations,
        assetBaseUrl: merged.assetBaseUrl
    });
}
