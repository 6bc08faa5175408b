/**
 * Scheduling Allocator
 *
 * Matches appointment requests to open provider slots, or parks them on
 * the waitlist. Booking a slot is a compare-and-set on the slot row, so
 * concurrent requests for the same slot get exactly one winner; losers
 * move on to their next candidate.
 */

import type {
  Appointment,
  AppointmentRequest,
  OptimizationRule,
  WaitlistEntry,
} from "../types/appointment.js";
import type { Patient } from "../types/patient.js";
import type { NetworkStatus, Provider, ScheduleSlot, SlotKey } from "../types/provider.js";
import type { Service } from "../types/payer.js";
import type { EngineConfig } from "../config.js";
import {
  appointmentsStorage,
  bookSlot,
  findProvidersBySpecialty,
  generateId,
  getActiveWaitlist,
  getCurrentSnapshot,
  getNetworkStatus,
  getSlot,
  isUniqueViolation,
  listOpenSlots,
  patientsStorage,
  providersStorage,
  releaseSlot as releaseSlotRow,
  transitionWaitlistEntry,
  updateAppointmentRequest,
  updateWaitlistEntry,
  waitlistStorage,
} from "../storage/index.js";
import {
  BusinessRuleError,
  NotFoundError,
  SlotConflictError,
  ValidationError,
} from "./errors.js";
import { inDateRange, inTimeWindow } from "./schedule-parsing.js";
import type { AuthRuleResolver } from "./auth-rule-resolver.js";
import type { Publish } from "./event-bus.js";

export type Allocation =
  | { kind: "appointment"; appointment: Appointment }
  | { kind: "waitlist"; entry: WaitlistEntry };

export interface AllocateOptions {
  /** Book as tentative until prior authorization is approved */
  contingentOnAuthorization: boolean;
}

export interface SchedulingReference {
  services: Service[];
  optimizationRules: OptimizationRule[];
}

export interface SchedulingAllocatorDeps {
  config: Pick<EngineConfig, "highComplexityThreshold">;
  reference: SchedulingReference;
  resolver: AuthRuleResolver;
  publish: Publish;

  /** Called after a freed slot fulfills a waitlist entry */
  onWaitlistFulfilled?: (entry: WaitlistEntry, appointment: Appointment) => Promise<void>;

  now?: () => Date;
}

export interface SlotCandidate {
  slot: ScheduleSlot;
  provider: Provider;
  preference: number;
}

/** Morning runs until noon */
const NOON = "12:00";

/**
 * Whether a complexity-cutoff rule keeps this patient out of this slot.
 */
export function excludedByCutoff(rules: OptimizationRule[], complexityScore: number, time: string): boolean {
  return rules.some(
    (rule) => rule.kind === "complexity_cutoff" && complexityScore >= rule.minComplexity && time >= rule.cutoffTime
  );
}

/**
 * Provider-preference score of a slot for a patient: +1 for each rule
 * preferring the patient's category in that period, -1 for each
 * preferring the other category.
 */
export function preferenceScore(
  rules: OptimizationRule[],
  providerId: string,
  time: string,
  complex: boolean
): number {
  const period = time < NOON ? "morning" : "afternoon";
  const category = complex ? "complex" : "routine";
  let score = 0;
  for (const rule of rules) {
    if (rule.kind !== "provider_preference" || rule.providerId !== providerId || rule.period !== period) continue;
    score += rule.patientCategory === category ? 1 : -1;
  }
  return score;
}

/**
 * Earliest first, then preference, then provider rating.
 */
export function compareCandidates(a: SlotCandidate, b: SlotCandidate): number {
  return (
    a.slot.date.localeCompare(b.slot.date) ||
    a.slot.time.localeCompare(b.slot.time) ||
    b.preference - a.preference ||
    b.provider.rating - a.provider.rating ||
    a.provider.id.localeCompare(b.provider.id)
  );
}

function slotKey(slot: SlotKey): SlotKey {
  return { providerId: slot.providerId, date: slot.date, time: slot.time };
}

function describe(slot: SlotKey): string {
  return `${slot.providerId} ${slot.date} ${slot.time}`;
}

export class SchedulingAllocator {
  private now: () => Date;

  constructor(private deps: SchedulingAllocatorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  load(reference: SchedulingReference): void {
    this.deps.reference = reference;
  }

  private service(code: string): Service {
    const service = this.deps.reference.services.find((s) => s.code === code);
    if (!service) throw new NotFoundError("Service", code);
    return service;
  }

  private isComplex(patient: Patient): boolean {
    return patient.complexityScore >= this.deps.config.highComplexityThreshold;
  }

  private async providersFor(service: Service, requestedProviderId?: string): Promise<Provider[]> {
    if (!requestedProviderId) {
      return findProvidersBySpecialty(service.specialties);
    }

    const provider = await providersStorage.get(requestedProviderId);
    if (!provider) throw new NotFoundError("Provider", requestedProviderId);
    const performs = service.specialties.some((s) => s.toLowerCase() === provider.specialty.toLowerCase());
    if (!performs) {
      throw new ValidationError(`${provider.name} (${provider.specialty}) does not perform ${service.code}`);
    }
    return [provider];
  }

  private async referralRequired(patientId: string, payerId: string, serviceCode: string): Promise<boolean> {
    if (this.deps.resolver.resolve(payerId, serviceCode).referralRequired) return true;
    const snapshot = await getCurrentSnapshot(patientId, payerId);
    return snapshot?.referralRequired ?? false;
  }

  /**
   * Book one slot and write the appointment.
   * Throws SlotConflictError when another request got the slot first.
   */
  private async book(
    slot: ScheduleSlot,
    provider: Provider,
    details: Pick<Appointment, "requestId" | "patientId" | "serviceCode" | "payerId">,
    contingent: boolean
  ): Promise<Appointment> {
    const key = slotKey(slot);
    if (!(await bookSlot(key, details.requestId))) {
      throw new SlotConflictError(key.providerId, key.date, key.time);
    }

    const now = this.now();
    let networkStatus: NetworkStatus;
    let appointment: Appointment;
    try {
      // No agreement covering the visit day counts as out of network
      networkStatus = (await getNetworkStatus(provider.id, details.payerId, slot.date)) ?? "out_of_network";
      appointment = {
        id: generateId(),
        requestId: details.requestId,
        patientId: details.patientId,
        serviceCode: details.serviceCode,
        payerId: details.payerId,
        providerId: provider.id,
        date: slot.date,
        time: slot.time,
        status: "scheduled",
        bookingState: contingent ? "tentative" : "confirmed",
        outOfNetwork: networkStatus === "out_of_network",
        ...(provider.clinicAddress && { clinicAddress: provider.clinicAddress }),
        createdAt: now,
        updatedAt: now,
      };
      await appointmentsStorage.save(appointment);
    } catch (err) {
      // The slot row must not stay booked without an appointment on it
      await releaseSlotRow(key);
      if (isUniqueViolation(err)) throw new SlotConflictError(key.providerId, key.date, key.time);
      throw err;
    }

    if (appointment.outOfNetwork) {
      console.warn(`[scheduling] ${provider.name} is out of network for ${details.payerId}; booked ${describe(key)} anyway`);
    }
    console.log(`[scheduling] Booked ${describe(key)} for request ${details.requestId} (${appointment.bookingState})`);

    await this.deps.publish({
      type: "appointment.booked",
      patientId: details.patientId,
      appointmentId: appointment.id,
      providerId: provider.id,
      payerId: details.payerId,
      networkStatus,
      referralRequired: await this.referralRequired(details.patientId, details.payerId, details.serviceCode),
      at: now,
    });
    return appointment;
  }

  /**
   * Open slots this request could take, best first.
   */
  async candidates(request: AppointmentRequest): Promise<SlotCandidate[]> {
    const patient = await patientsStorage.get(request.patientId);
    if (!patient) throw new NotFoundError("Patient", request.patientId);
    const service = this.service(request.serviceCode);

    const providers = await this.providersFor(service, request.requestedProviderId);
    const byId = new Map(providers.map((p) => [p.id, p]));
    const slots = await listOpenSlots([...byId.keys()], request.dateRange);
    const rules = this.deps.reference.optimizationRules;
    const complex = this.isComplex(patient);

    const candidates: SlotCandidate[] = [];
    for (const slot of slots) {
      const provider = byId.get(slot.providerId);
      if (!provider) continue;
      if (!inTimeWindow(slot.time, request.timeWindow)) continue;
      if (excludedByCutoff(rules, patient.complexityScore, slot.time)) continue;
      candidates.push({ slot, provider, preference: preferenceScore(rules, provider.id, slot.time, complex) });
    }
    return candidates.sort(compareCandidates);
  }

  /**
   * Place a request into a slot, or onto the waitlist when none is free.
   */
  async allocate(request: AppointmentRequest, options: AllocateOptions): Promise<Allocation> {
    if (request.status !== "pending") {
      throw new BusinessRuleError(`Appointment request ${request.id} is already ${request.status}`);
    }

    for (const { slot, provider } of await this.candidates(request)) {
      try {
        const appointment = await this.book(slot, provider, request, options.contingentOnAuthorization);
        await updateAppointmentRequest(request.id, { status: "scheduled", appointmentId: appointment.id });
        return { kind: "appointment", appointment };
      } catch (err) {
        if (!(err instanceof SlotConflictError)) throw err;
        console.log(`[scheduling] ${err.message}; trying next candidate`);
      }
    }

    const now = this.now();
    const entry: WaitlistEntry = {
      id: generateId(),
      requestId: request.id,
      patientId: request.patientId,
      serviceCode: request.serviceCode,
      payerId: request.payerId,
      ...(request.requestedProviderId && { desiredProviderId: request.requestedProviderId }),
      ...(request.dateRange && { dateRange: request.dateRange }),
      ...(request.timeWindow && { timeWindow: request.timeWindow }),
      urgencyScore: request.urgencyScore,
      contingentOnAuthorization: options.contingentOnAuthorization,
      status: "active",
      addedAt: now,
      updatedAt: now,
    };
    await waitlistStorage.save(entry);
    await updateAppointmentRequest(request.id, { status: "waitlisted", waitlistEntryId: entry.id });
    console.log(`[scheduling] No open slot for request ${request.id}; waitlisted`);
    return { kind: "waitlist", entry };
  }

  /**
   * Whether a waitlist entry would accept this slot.
   */
  private async fits(entry: WaitlistEntry, slot: ScheduleSlot, provider: Provider): Promise<boolean> {
    if (entry.desiredProviderId && entry.desiredProviderId !== provider.id) return false;
    if (!inDateRange(slot.date, entry.dateRange) || !inTimeWindow(slot.time, entry.timeWindow)) return false;

    const service = this.deps.reference.services.find((s) => s.code === entry.serviceCode);
    if (!service?.specialties.some((s) => s.toLowerCase() === provider.specialty.toLowerCase())) return false;

    const patient = await patientsStorage.get(entry.patientId);
    if (!patient) return false;
    return !excludedByCutoff(this.deps.reference.optimizationRules, patient.complexityScore, slot.time);
  }

  /**
   * Offer a freed slot to the waitlist: highest urgency first, then
   * first come first served. Returns the fulfilled entry, if any.
   */
  async reevaluateWaitlist(key: SlotKey): Promise<WaitlistEntry | null> {
    const slot = await getSlot(key);
    if (slot?.status !== "open") return null;
    const provider = await providersStorage.get(slot.providerId);
    if (!provider) return null;

    // getActiveWaitlist is oldest first and the sort is stable
    const queue = (await getActiveWaitlist()).sort((a, b) => b.urgencyScore - a.urgencyScore);

    for (const entry of queue) {
      if (!(await this.fits(entry, slot, provider))) continue;

      // Claim the entry first so a second freed slot cannot go to it too
      const claimed = await transitionWaitlistEntry(entry.id, "active", "fulfilled");
      if (!claimed) continue;

      let appointment: Appointment;
      try {
        appointment = await this.book(slot, provider, entry, entry.contingentOnAuthorization);
      } catch (err) {
        await transitionWaitlistEntry(entry.id, "fulfilled", "active");
        if (err instanceof SlotConflictError) return null;
        throw err;
      }

      const fulfilled = await updateWaitlistEntry(entry.id, { appointmentId: appointment.id });
      await updateAppointmentRequest(entry.requestId, { status: "scheduled", appointmentId: appointment.id });
      console.log(`[scheduling] Waitlist entry ${entry.id} fulfilled with ${describe(key)}`);

      const result = fulfilled ?? { ...claimed, appointmentId: appointment.id };
      if (this.deps.onWaitlistFulfilled) {
        await this.deps.onWaitlistFulfilled(result, appointment);
      }
      return result;
    }
    return null;
  }

  /**
   * Cancel an appointment, free its slot and offer it to the waitlist.
   */
  async cancelAppointment(appointmentId: string): Promise<{ appointment: Appointment; fulfilled: WaitlistEntry | null }> {
    const appointment = await appointmentsStorage.get(appointmentId);
    if (!appointment) throw new NotFoundError("Appointment", appointmentId);
    if (appointment.status === "canceled") {
      return { appointment, fulfilled: null };
    }
    if (appointment.status === "completed") {
      throw new BusinessRuleError(`Appointment ${appointmentId} is already completed`);
    }

    const canceled: Appointment = { ...appointment, status: "canceled", updatedAt: this.now() };
    await appointmentsStorage.save(canceled);
    const key = slotKey(appointment);
    await releaseSlotRow(key);
    console.log(`[scheduling] Canceled ${appointmentId}; ${describe(key)} is open again`);

    return { appointment: canceled, fulfilled: await this.reevaluateWaitlist(key) };
  }

  /**
   * Return a booked slot to open. A live appointment on it is canceled.
   */
  async releaseSlot(key: SlotKey): Promise<WaitlistEntry | null> {
    const live = (await appointmentsStorage.findAllByIndex("providerId", key.providerId)).find(
      (a) => a.date === key.date && a.time === key.time && a.status !== "canceled"
    );
    if (live) {
      return (await this.cancelAppointment(live.id)).fulfilled;
    }

    await releaseSlotRow(key);
    return this.reevaluateWaitlist(key);
  }

  /**
   * Tentative -> confirmed, once authorization is approved.
   */
  async confirmAppointment(appointmentId: string): Promise<Appointment> {
    const appointment = await appointmentsStorage.get(appointmentId);
    if (!appointment) throw new NotFoundError("Appointment", appointmentId);
    if (appointment.status === "canceled") {
      throw new BusinessRuleError(`Appointment ${appointmentId} was canceled`);
    }
    if (appointment.bookingState === "confirmed") return appointment;

    const confirmed: Appointment = { ...appointment, bookingState: "confirmed", updatedAt: this.now() };
    await appointmentsStorage.save(confirmed);
    console.log(`[scheduling] Appointment ${appointmentId} confirmed`);
    return confirmed;
  }

  /**
   * Expire active entries whose date range ended before `today` ("YYYY-MM-DD").
   */
  async expireWaitlist(today: string): Promise<WaitlistEntry[]> {
    const expired: WaitlistEntry[] = [];
    for (const entry of await getActiveWaitlist()) {
      if (!entry.dateRange || entry.dateRange.end >= today) continue;
      const updated = await transitionWaitlistEntry(entry.id, "active", "expired");
      if (updated) expired.push(updated);
    }
    return expired;
  }

  /**
   * Take a request's entry off the waitlist.
   */
  async withdrawWaitlistEntry(entryId: string): Promise<WaitlistEntry | null> {
    const entry = await waitlistStorage.get(entryId);
    if (entry?.status !== "active") return entry;
    return (await transitionWaitlistEntry(entryId, "active", "withdrawn")) ?? waitlistStorage.get(entryId);
  }

  async activeWaitlist(): Promise<WaitlistEntry[]> {
    return getActiveWaitlist();
  }
}
