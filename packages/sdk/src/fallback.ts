/**
 * Substitute results served while the backing store is unavailable ("demo mode")
 * or when a live aggregation fails
 */

import demoData from "./demo-data.json" with { type: "json" };
import type {
  AnimalRecord,
  BreedPerformance,
  DemographicSummary,
  MonthlyAdoptionTrend,
  RescueTypeAnalytics,
} from "./types.js";

/**
 * A representative payload for raw reads and each aggregation
 */
export interface FallbackDataset {
  records: readonly AnimalRecord[];
  breedPerformance: readonly BreedPerformance[];
  rescueTypeAnalytics: RescueTypeAnalytics;
  adoptionTrends: readonly MonthlyAdoptionTrend[];
  demographics: readonly DemographicSummary[];
}

/**
 * Source of substitute results. Every call returns a fresh copy, and the
 * same call always returns an equal payload.
 */
export interface FallbackProvider {
  records(): AnimalRecord[];
  breedPerformance(): BreedPerformance[];
  rescueTypeAnalytics(): RescueTypeAnalytics;
  adoptionTrends(): MonthlyAdoptionTrend[];
  demographics(): DemographicSummary[];
}

const DEMO_DATASET: FallbackDataset = demoData;

class DatasetFallbackProvider implements FallbackProvider {
  readonly #dataset: FallbackDataset;

  constructor(dataset: FallbackDataset) {
    this.#dataset = structuredClone(dataset);
  }

  records(): AnimalRecord[] {
    return structuredClone([...this.#dataset.records]);
  }

  breedPerformance(): BreedPerformance[] {
    return structuredClone([...this.#dataset.breedPerformance]);
  }

  rescueTypeAnalytics(): RescueTypeAnalytics {
    return structuredClone(this.#dataset.rescueTypeAnalytics);
  }

  adoptionTrends(): MonthlyAdoptionTrend[] {
    return structuredClone([...this.#dataset.adoptionTrends]);
  }

  demographics(): DemographicSummary[] {
    return structuredClone([...this.#dataset.demographics]);
  }
}

/**
 * The built-in demo dataset
 */
export class DemoFallbackProvider extends DatasetFallbackProvider {
  constructor() {
    super(DEMO_DATASET);
  }
}

/**
 * Build a provider over a caller-supplied dataset
 */
export function createFallbackProvider(dataset: FallbackDataset): FallbackProvider {
  return new DatasetFallbackProvider(dataset);
}
