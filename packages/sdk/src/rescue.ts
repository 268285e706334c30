/**
 * Rescue-training eligibility classes
 */

import { parseNumeric } from "./query.js";
import type { AnimalRecord, RescueType } from "./types.js";

export interface RescueProfile {
  readonly type: RescueType;
  /** Human-readable label for reports */
  readonly label: string;
  /** Eligible breeds, in reporting order */
  readonly breeds: readonly string[];
  readonly sex: string;
  readonly minAgeWeeks: number;
  readonly maxAgeWeeks: number;
}

export const RESCUE_TYPES: readonly RescueType[] = ["water", "wilderness", "disaster"];

export const RESCUE_PROFILES: Readonly<Record<RescueType, RescueProfile>> = {
  water: {
    type: "water",
    label: "Water Rescue",
    breeds: ["Labrador Retriever Mix", "Chesapeake Bay Retriever", "Newfoundland"],
    sex: "Intact Female",
    minAgeWeeks: 26,
    maxAgeWeeks: 156,
  },
  wilderness: {
    type: "wilderness",
    label: "Mountain/Wilderness Rescue",
    breeds: [
      "German Shepherd",
      "Alaskan Malamute",
      "Old English Sheepdog",
      "Siberian Husky",
      "Rottweiler",
    ],
    sex: "Intact Male",
    minAgeWeeks: 26,
    maxAgeWeeks: 156,
  },
  disaster: {
    type: "disaster",
    label: "Disaster/Individual Tracking",
    breeds: ["Doberman Pinscher", "German Shepherd", "Golden Retriever", "Bloodhound", "Rottweiler"],
    sex: "Intact Male",
    minAgeWeeks: 20,
    maxAgeWeeks: 300,
  },
};

/**
 * Test a record against a rescue class
 *
 * Absent or null age is eligible; a present age that does not parse as a number is not.
 * @param applyAgeWindow - Enforce the class's age window (default: true)
 */
export function isRescueEligible(
  record: AnimalRecord,
  profile: RescueProfile,
  applyAgeWindow = true
): boolean {
  if (
    record.animal_type !== "Dog" ||
    typeof record.breed !== "string" ||
    !profile.breeds.includes(record.breed) ||
    record.sex_upon_outcome !== profile.sex
  ) {
    return false;
  }
  if (!applyAgeWindow) {
    return true;
  }

  const age = record.age_upon_outcome_in_weeks;
  if (age === undefined || age === null) {
    return true;
  }
  const weeks = parseNumeric(age);
  return weeks !== undefined && weeks >= profile.minAgeWeeks && weeks <= profile.maxAgeWeeks;
}

