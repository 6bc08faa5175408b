/**
 * Patient identity and profile types.
 * Demographics, communication preferences and the payer coverages
 * a patient is enrolled in.
 */

/** Channel a patient prefers for outreach */
export type CommunicationChannel = "SMS" | "Email" | "Patient Portal";

/** All communication channels for iteration */
export const COMMUNICATION_CHANNELS: readonly CommunicationChannel[] = [
  "SMS",
  "Email",
  "Patient Portal",
] as const;

/**
 * Enrollment of a patient in a payer's plan.
 * The member ID is what the payer connector queries with.
 */
export interface PatientCoverage {
  /** Payer the patient is enrolled with */
  payerId: string;

  /** Member ID on the insurance card (may be blank when intake missed it) */
  memberId: string;

  /** Group number, when the plan is employer sponsored */
  groupNumber?: string;
}

/**
 * Communication preferences used when composing outreach.
 */
export interface CommunicationPreferences {
  preferredChannel: CommunicationChannel;

  /** Whether the patient opted in to automated messages */
  optIn: boolean;

  /** Preferred reminder time, "HH:MM" */
  reminderTime?: string;
}

/**
 * A patient known to the practice.
 */
export interface Patient {
  /** Internal identifier */
  id: string;

  /** Full legal name */
  fullName: string;

  /** Date of birth, "YYYY-MM-DD" */
  dateOfBirth: string;

  gender?: string;
  address?: string;
  phoneNumber?: string;
  email?: string;
  preferredLanguage?: string;

  /** Medical complexity score, 1 (simple) to 5 (complex) */
  complexityScore: number;

  /** Historical no-show rate, 0..1 */
  noShowRate: number;

  communication: CommunicationPreferences;

  /** Payer enrollments */
  coverages: PatientCoverage[];

  /** Creation timestamp */
  createdAt: Date;

  /** Last update timestamp */
  updatedAt: Date;
}

/**
 * Input type for creating a new patient (without auto-generated fields).
 * An explicit id may be supplied when importing from an upstream system.
 */
export type CreatePatientInput = Omit<Patient, "id" | "createdAt" | "updatedAt"> & {
  id?: string;
};

/**
 * Input type for updating an existing patient.
 */
export type UpdatePatientInput = Partial<Omit<Patient, "id" | "createdAt" | "updatedAt">>;
