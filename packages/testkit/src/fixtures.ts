/**
 * Record builders for tests
 */

import type { AnimalRecord } from "@shelter-records/sdk";

let sequence = 0;

/**
 * An adopted adult dog, with any field overridden. Each call gets a fresh animal_id.
 */
export function animalRecord(overrides: AnimalRecord = {}): AnimalRecord {
  sequence += 1;
  return {
    animal_id: `T${String(sequence).padStart(4, "0")}`,
    name: "Test Animal",
    animal_type: "Dog",
    breed: "Labrador Retriever Mix",
    color: "Black",
    sex_upon_outcome: "Intact Male",
    age_upon_outcome: "1 year",
    age_upon_outcome_in_weeks: 52,
    datetime: "2024-03-15 10:30:00",
    outcome_type: "Adoption",
    ...overrides,
  };
}

/**
 * `count` records built from the same overrides
 */
export function animalRecords(count: number, overrides: AnimalRecord = {}): AnimalRecord[] {
  return Array.from({ length: count }, () => animalRecord(overrides));
}

/**
 * A small mixed data set: three dogs, one cat, one bird
 */
export function shelterRecords(): AnimalRecord[] {
  return [
    animalRecord({ animal_id: "S001", name: "Rex", breed: "Labrador Retriever Mix" }),
    animalRecord({
      animal_id: "S002",
      name: "Bella",
      breed: "German Shepherd",
      sex_upon_outcome: "Intact Female",
      age_upon_outcome_in_weeks: 40,
      outcome_type: "Transfer",
    }),
    animalRecord({
      animal_id: "S003",
      name: "Duke",
      breed: "Bloodhound",
      age_upon_outcome_in_weeks: 200,
      outcome_type: "Return to Owner",
    }),
    animalRecord({
      animal_id: "S004",
      name: "Whiskers",
      animal_type: "Cat",
      breed: "Siamese",
      sex_upon_outcome: "Spayed Female",
      age_upon_outcome_in_weeks: 104,
    }),
    animalRecord({
      animal_id: "S005",
      name: "Tweety",
      animal_type: "Bird",
      breed: "Parakeet",
      age_upon_outcome_in_weeks: 30,
      outcome_type: "Transfer",
    }),
  ];
}
