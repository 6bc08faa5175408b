/**
 * Provider, network participation and schedule types.
 */

/** Whether a provider participates in a payer's network */
export type NetworkStatus = "in_network" | "out_of_network";

/** All network statuses for iteration */
export const NETWORK_STATUSES: readonly NetworkStatus[] = [
  "in_network",
  "out_of_network",
] as const;

/**
 * Availability of a schedule slot.
 */
export type SlotStatus = "open" | "booked" | "blocked";

/** All slot statuses for iteration */
export const SLOT_STATUSES: readonly SlotStatus[] = [
  "open",
  "booked",
  "blocked",
] as const;

/**
 * A rendering provider.
 */
export interface Provider {
  id: string;

  /** Display name (e.g., "Dr. Alice Brown") */
  name: string;

  /** Specialty (e.g., "Dermatology") */
  specialty: string;

  /** National Provider Identifier */
  npi?: string;

  /** Clinic location identifier */
  clinicLocationId?: string;

  /** Clinic street address, printed on appointment confirmations */
  clinicAddress?: string;

  /** Patient rating, 0..5; used as the last scheduling tie-break */
  rating: number;

  /** Whether the provider is a designated primary care provider */
  isPcp: boolean;
}

/**
 * Network agreement between a provider and a payer.
 * At most one agreement per (provider, payer).
 */
export interface NetworkAgreement {
  id: string;
  providerId: string;
  payerId: string;
  networkStatus: NetworkStatus;

  /** First day the agreement applies, "YYYY-MM-DD" */
  effectiveDate: string;

  /** Last day the agreement applies, "YYYY-MM-DD" */
  terminationDate?: string;
}

/**
 * A bookable time slot on a provider's schedule.
 * Unique per (provider, date, time).
 */
export interface ScheduleSlot {
  providerId: string;

  /** "YYYY-MM-DD" */
  date: string;

  /** "HH:MM" */
  time: string;

  status: SlotStatus;

  /** Assigned room, if any */
  roomId?: string;

  /** Slot capacity label (e.g., "New Patient Slot", "Follow-up") */
  capacityLabel?: string;

  /** Appointment request that holds the slot while booked */
  heldByRequestId?: string;
}

/**
 * Unique key of a schedule slot.
 */
export type SlotKey = Pick<ScheduleSlot, "providerId" | "date" | "time">;

export type CreateProviderInput = Provider;

export type CreateNetworkAgreementInput = Omit<NetworkAgreement, "id">;

export type CreateScheduleSlotInput = Omit<ScheduleSlot, "heldByRequestId">;
