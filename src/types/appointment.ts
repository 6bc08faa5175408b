/**
 * Appointment request, appointment and waitlist types.
 */

/**
 * Inclusive date range, "YYYY-MM-DD" bounds.
 */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * Time-of-day window, "HH:MM" bounds.
 * `from` is inclusive, `to` is exclusive.
 */
export interface TimeWindow {
  from?: string;
  to?: string;
}

/**
 * Lifecycle of an appointment request.
 */
export type AppointmentRequestStatus =
  | "pending"    // Received, not yet resolved
  | "scheduled"  // Resolved into an appointment
  | "waitlisted" // Resolved into a waitlist entry
  | "withdrawn"; // Canceled by the patient or staff

/** All request statuses for iteration */
export const APPOINTMENT_REQUEST_STATUSES: readonly AppointmentRequestStatus[] = [
  "pending",
  "scheduled",
  "waitlisted",
  "withdrawn",
] as const;

/**
 * A patient's request for a service.
 */
export interface AppointmentRequest {
  id: string;
  patientId: string;
  serviceCode: string;
  payerId: string;
  requestedProviderId?: string;
  dateRange?: DateRange;
  timeWindow?: TimeWindow;

  /** 1 (routine) to 5 (urgent) */
  urgencyScore: number;

  status: AppointmentRequestStatus;

  /** Set when the request resolves into an appointment */
  appointmentId?: string;

  /** Set when the request resolves into a waitlist entry */
  waitlistEntryId?: string;

  /** PA request opened for this appointment, if authorization is required */
  paRequestId?: string;

  createdAt: Date;
  updatedAt: Date;
  withdrawnAt?: Date;
}

export type CreateAppointmentRequestInput = Pick<
  AppointmentRequest,
  "patientId" | "serviceCode" | "payerId" | "urgencyScore"
> &
  Partial<Pick<AppointmentRequest, "requestedProviderId" | "dateRange" | "timeWindow">>;

/**
 * Appointment status.
 */
export type AppointmentStatus = "scheduled" | "completed" | "canceled";

/** All appointment statuses for iteration */
export const APPOINTMENT_STATUSES: readonly AppointmentStatus[] = [
  "scheduled",
  "completed",
  "canceled",
] as const;

/**
 * Whether the appointment still waits on prior authorization.
 */
export type BookingState = "tentative" | "confirmed";

/**
 * A bound (patient, provider, service, payer, slot).
 */
export interface Appointment {
  id: string;
  requestId: string;
  patientId: string;
  providerId: string;
  serviceCode: string;
  payerId: string;

  /** Slot date, "YYYY-MM-DD" */
  date: string;

  /** Slot time, "HH:MM" */
  time: string;

  status: AppointmentStatus;
  bookingState: BookingState;

  /** True when the provider was out of network for the payer at booking */
  outOfNetwork: boolean;

  clinicAddress?: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Status of a waitlist entry.
 */
export type WaitlistStatus = "active" | "fulfilled" | "expired" | "withdrawn";

/** All waitlist statuses for iteration */
export const WAITLIST_STATUSES: readonly WaitlistStatus[] = [
  "active",
  "fulfilled",
  "expired",
  "withdrawn",
] as const;

/**
 * A request that could not be placed, waiting for a freed slot.
 */
export interface WaitlistEntry {
  id: string;
  requestId: string;
  patientId: string;
  serviceCode: string;
  payerId: string;
  desiredProviderId?: string;
  dateRange?: DateRange;
  timeWindow?: TimeWindow;
  urgencyScore: number;

  /** Whether the booking must wait on prior authorization */
  contingentOnAuthorization: boolean;

  status: WaitlistStatus;
  appointmentId?: string;

  /** FIFO key among entries of equal urgency */
  addedAt: Date;
  updatedAt: Date;
}

/**
 * Part of the day a provider preference applies to.
 */
export type DayPeriod = "morning" | "afternoon";

/**
 * Patient category a provider preference targets.
 */
export type PatientCategory = "complex" | "routine";

/**
 * Scheduling optimization rule.
 */
export type OptimizationRule =
  | {
      id: string;
      kind: "complexity_cutoff";
      /** Patients at or above this complexity are excluded at/after `cutoffTime` */
      minComplexity: number;
      cutoffTime: string;
      goal?: string;
    }
  | {
      id: string;
      kind: "provider_preference";
      providerId: string;
      period: DayPeriod;
      patientCategory: PatientCategory;
      goal?: string;
    };
