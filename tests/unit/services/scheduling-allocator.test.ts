import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  SchedulingAllocator,
  compareCandidates,
  excludedByCutoff,
  preferenceScore,
  type SlotCandidate,
} from "../../../src/services/scheduling-allocator.js";
import { AuthRuleResolver } from "../../../src/services/auth-rule-resolver.js";
import { BusinessRuleError, ValidationError } from "../../../src/services/errors.js";
import {
  appointmentRequestsStorage,
  appointmentsStorage,
  createAppointmentRequest,
  getSlot,
  readSeedFile,
  upsertNetworkAgreement,
} from "../../../src/storage/index.js";
import type {
  Appointment,
  AppointmentRequest,
  CreateAppointmentRequestInput,
  OptimizationRule,
  WaitlistEntry,
} from "../../../src/types/appointment.js";
import type { Provider } from "../../../src/types/provider.js";
import { eventLog, fixedClock, resetDatabase, seedSampleClinic, testConfig } from "../helpers.js";

const rules: OptimizationRule[] = [
  { id: "CUTOFF", kind: "complexity_cutoff", minComplexity: 4, cutoffTime: "15:00" },
  { id: "AM-COMPLEX", kind: "provider_preference", providerId: "p1", period: "morning", patientCategory: "complex" },
  { id: "PM-ROUTINE", kind: "provider_preference", providerId: "p1", period: "afternoon", patientCategory: "routine" },
];

/** Dermatology consult at Dr. Brown's 16:00 slot on 1 July */
function afternoonConsult(overrides: Partial<CreateAppointmentRequestInput> = {}): CreateAppointmentRequestInput {
  return {
    patientId: "101",
    serviceCode: "CPT99203",
    payerId: "aetna-ppo",
    urgencyScore: 3,
    requestedProviderId: "201",
    dateRange: { start: "2025-07-01", end: "2025-07-01" },
    timeWindow: { from: "16:00" },
    ...overrides,
  };
}

describe("slot ranking helpers", () => {
  it("keeps complex patients out of slots at or after the cutoff", () => {
    expect(excludedByCutoff(rules, 4, "15:00")).toBe(true);
    expect(excludedByCutoff(rules, 4, "14:59")).toBe(false);
    expect(excludedByCutoff(rules, 3, "16:00")).toBe(false);
  });

  it("scores provider preferences by period and patient category", () => {
    expect(preferenceScore(rules, "p1", "09:00", true)).toBe(1);
    expect(preferenceScore(rules, "p1", "09:00", false)).toBe(-1);
    expect(preferenceScore(rules, "p1", "12:00", false)).toBe(1);
    expect(preferenceScore(rules, "p2", "09:00", true)).toBe(0);
  });

  it("orders by time first, then preference, then rating", () => {
    const provider = (id: string, rating: number): Provider => ({
      id,
      name: id,
      specialty: "Dermatology",
      rating,
      isPcp: false,
    });
    const candidate = (time: string, preference: number, p: Provider): SlotCandidate => ({
      slot: { providerId: p.id, date: "2025-07-01", time, status: "open" },
      provider: p,
      preference,
    });

    const sorted = [
      candidate("10:00", 0, provider("b", 4.9)),
      candidate("09:00", -1, provider("a", 4.0)),
      candidate("10:00", 1, provider("c", 4.0)),
      candidate("10:00", 0, provider("d", 4.2)),
    ].sort(compareCandidates);

    expect(sorted.map((c) => c.provider.id)).toEqual(["a", "c", "b", "d"]);
  });
});

describe("SchedulingAllocator", () => {
  let log: ReturnType<typeof eventLog>;
  let allocator: SchedulingAllocator;
  let fulfilled: Array<{ entry: WaitlistEntry; appointment: Appointment }>;

  async function request(input: CreateAppointmentRequestInput): Promise<AppointmentRequest> {
    return createAppointmentRequest(input);
  }

  beforeEach(async () => {
    resetDatabase();
    await seedSampleClinic();
    log = eventLog();
    fulfilled = [];
    const seed = readSeedFile();
    allocator = new SchedulingAllocator({
      config: testConfig(),
      reference: { services: seed.services, optimizationRules: seed.optimizationRules },
      resolver: new AuthRuleResolver(seed.authorizationRules),
      publish: log.publish,
      onWaitlistFulfilled: async (entry, appointment) => {
        fulfilled.push({ entry, appointment });
      },
      now: fixedClock().now,
    });
  });

  it("keeps a complex patient in the morning", async () => {
    const candidates = await allocator.candidates(
      await request({ patientId: "103", serviceCode: "CPT70551", payerId: "aetna-ppo", urgencyScore: 3 })
    );

    expect(candidates.map((c) => [c.slot.date, c.slot.time, c.preference])).toEqual([
      ["2025-07-01", "10:00", 1],
      ["2025-07-01", "11:00", 1],
    ]);
  });

  it("offers a routine patient every open slot, earliest first", async () => {
    const candidates = await allocator.candidates(
      await request({ patientId: "101", serviceCode: "CPT99203", payerId: "aetna-ppo", urgencyScore: 3 })
    );

    expect(candidates.map((c) => [c.slot.date, c.slot.time, c.preference])).toEqual([
      ["2025-07-01", "10:00", -1],
      ["2025-07-01", "11:00", -1],
      ["2025-07-01", "16:00", 1],
      ["2025-07-02", "16:30", 1],
    ]);
  });

  it("books the slot inside the requested window", async () => {
    const req = await request(afternoonConsult());

    const allocation = await allocator.allocate(req, { contingentOnAuthorization: false });

    if (allocation.kind !== "appointment") throw new Error("expected an appointment");
    expect(allocation.appointment).toMatchObject({
      providerId: "201",
      date: "2025-07-01",
      time: "16:00",
      status: "scheduled",
      bookingState: "confirmed",
      outOfNetwork: false,
      clinicAddress: "123 Main St, Anytown",
    });
    expect((await getSlot({ providerId: "201", date: "2025-07-01", time: "16:00" }))?.status).toBe("booked");
    expect((await appointmentRequestsStorage.get(req.id))?.status).toBe("scheduled");
  });

  it("books tentatively while authorization is pending", async () => {
    const allocation = await allocator.allocate(await request(afternoonConsult()), { contingentOnAuthorization: true });

    if (allocation.kind !== "appointment") throw new Error("expected an appointment");
    expect(allocation.appointment.bookingState).toBe("tentative");

    const confirmed = await allocator.confirmAppointment(allocation.appointment.id);
    expect(confirmed.bookingState).toBe("confirmed");
  });

  it("waitlists an identical request and fills it when the slot frees up", async () => {
    const first = await allocator.allocate(await request(afternoonConsult()), { contingentOnAuthorization: false });
    const secondRequest = await request(afternoonConsult({ patientId: "102", payerId: "bcbs-basic" }));
    const second = await allocator.allocate(secondRequest, { contingentOnAuthorization: false });

    if (first.kind !== "appointment" || second.kind !== "waitlist") throw new Error("unexpected allocation");
    expect(second.entry).toMatchObject({ requestId: secondRequest.id, desiredProviderId: "201", status: "active" });

    const { appointment, fulfilled: entry } = await allocator.cancelAppointment(first.appointment.id);

    expect(appointment.status).toBe("canceled");
    expect(entry?.status).toBe("fulfilled");
    expect(fulfilled).toHaveLength(1);
    expect(fulfilled[0]?.appointment).toMatchObject({ patientId: "102", date: "2025-07-01", time: "16:00" });
    expect((await appointmentRequestsStorage.get(secondRequest.id))?.status).toBe("scheduled");
    expect(await allocator.activeWaitlist()).toEqual([]);
  });

  it("gives a freed slot to the most urgent waiting request", async () => {
    const first = await allocator.allocate(await request(afternoonConsult()), { contingentOnAuthorization: false });
    await allocator.allocate(await request(afternoonConsult({ patientId: "102", payerId: "bcbs-basic", urgencyScore: 2 })), {
      contingentOnAuthorization: false,
    });
    const urgent = await request(afternoonConsult({ urgencyScore: 5 }));
    await allocator.allocate(urgent, { contingentOnAuthorization: false });

    if (first.kind !== "appointment") throw new Error("expected an appointment");
    const { fulfilled: entry } = await allocator.cancelAppointment(first.appointment.id);

    expect(entry?.requestId).toBe(urgent.id);
    expect((await allocator.activeWaitlist()).map((e) => e.urgencyScore)).toEqual([2]);
  });

  it("gives a contested slot to exactly one of two simultaneous requests", async () => {
    const a = await request(afternoonConsult());
    const b = await request(afternoonConsult({ patientId: "102", payerId: "bcbs-basic" }));

    const results = await Promise.all([
      allocator.allocate(a, { contingentOnAuthorization: false }),
      allocator.allocate(b, { contingentOnAuthorization: false }),
    ]);

    expect(results.map((r) => r.kind).sort()).toEqual(["appointment", "waitlist"]);
  });

  it("flags an out-of-network booking", async () => {
    const allocation = await allocator.allocate(
      await request({
        patientId: "102",
        serviceCode: "CPT99213",
        payerId: "bcbs-basic",
        urgencyScore: 3,
        requestedProviderId: "202",
      }),
      { contingentOnAuthorization: false }
    );

    if (allocation.kind !== "appointment") throw new Error("expected an appointment");
    expect(allocation.appointment.outOfNetwork).toBe(true);
    expect(log.events.at(-1)).toMatchObject({
      type: "appointment.booked",
      providerId: "202",
      networkStatus: "out_of_network",
      referralRequired: true,
    });
  });

  it("rejects a requested provider outside the service's specialties", async () => {
    const req = await request({
      patientId: "101",
      serviceCode: "CPT99203",
      payerId: "aetna-ppo",
      urgencyScore: 3,
      requestedProviderId: "202",
    });

    await expect(allocator.allocate(req, { contingentOnAuthorization: false })).rejects.toBeInstanceOf(ValidationError);
  });

  it("only allocates pending requests", async () => {
    const req = await request(afternoonConsult());
    await allocator.allocate(req, { contingentOnAuthorization: false });

    const stored = await appointmentRequestsStorage.get(req.id);
    if (!stored) throw new Error("request missing");
    await expect(allocator.allocate(stored, { contingentOnAuthorization: false })).rejects.toBeInstanceOf(
      BusinessRuleError
    );
  });

  it("refuses to confirm a canceled appointment", async () => {
    const allocation = await allocator.allocate(await request(afternoonConsult()), { contingentOnAuthorization: true });
    if (allocation.kind !== "appointment") throw new Error("expected an appointment");
    await allocator.cancelAppointment(allocation.appointment.id);

    await expect(allocator.confirmAppointment(allocation.appointment.id)).rejects.toBeInstanceOf(BusinessRuleError);
  });

  it("expires entries whose date range has passed", async () => {
    await allocator.allocate(await request(afternoonConsult()), { contingentOnAuthorization: false });
    const dated = await allocator.allocate(await request(afternoonConsult({ patientId: "102", payerId: "bcbs-basic" })), {
      contingentOnAuthorization: false,
    });

    expect(await allocator.expireWaitlist("2025-07-01")).toEqual([]);
    const expired = await allocator.expireWaitlist("2025-07-02");

    if (dated.kind !== "waitlist") throw new Error("expected a waitlist entry");
    expect(expired.map((e) => [e.id, e.status])).toEqual([[dated.entry.id, "expired"]]);
  });

  it("releases a slot by canceling the appointment on it", async () => {
    const spy = vi.spyOn(allocator, "cancelAppointment");
    const allocation = await allocator.allocate(await request(afternoonConsult()), { contingentOnAuthorization: false });
    if (allocation.kind !== "appointment") throw new Error("expected an appointment");

    await allocator.releaseSlot({ providerId: "201", date: "2025-07-01", time: "16:00" });

    expect(spy).toHaveBeenCalledWith(allocation.appointment.id);
    expect((await getSlot({ providerId: "201", date: "2025-07-01", time: "16:00" }))?.status).toBe("open");
  });

  it("gives two slots freed at once to two different waiting requests", async () => {
    const booked: Appointment[] = [];
    for (let i = 0; i < 4; i++) {
      const allocation = await allocator.allocate(
        await request({ patientId: "101", serviceCode: "CPT99203", payerId: "aetna-ppo", urgencyScore: 3, requestedProviderId: "201" }),
        { contingentOnAuthorization: false }
      );
      if (allocation.kind !== "appointment") throw new Error("expected an appointment");
      booked.push(allocation.appointment);
    }
    const waiting = await request({
      patientId: "102",
      serviceCode: "CPT99203",
      payerId: "bcbs-basic",
      urgencyScore: 3,
      requestedProviderId: "201",
    });
    expect((await allocator.allocate(waiting, { contingentOnAuthorization: false })).kind).toBe("waitlist");

    const [a0, a1] = booked;
    if (!a0 || !a1) throw new Error("expected four bookings");
    const results = await Promise.all([allocator.cancelAppointment(a0.id), allocator.cancelAppointment(a1.id)]);

    expect(results.filter((r) => r.fulfilled !== null)).toHaveLength(1);
    const live = (await appointmentsStorage.findAllByIndex("requestId", waiting.id)).filter((a) => a.status !== "canceled");
    expect(live).toHaveLength(1);
    expect(fulfilled).toHaveLength(1);

    const open = await Promise.all([a0, a1].map((a) => getSlot(a)));
    expect(open.filter((slot) => slot?.status === "open")).toHaveLength(1);
  });

  it("judges network participation on the day of the visit", async () => {
    await upsertNetworkAgreement({
      providerId: "201",
      payerId: "aetna-ppo",
      networkStatus: "in_network",
      effectiveDate: "2020-01-01",
      terminationDate: "2025-06-30",
    });

    const allocation = await allocator.allocate(await request(afternoonConsult()), { contingentOnAuthorization: false });

    if (allocation.kind !== "appointment") throw new Error("expected an appointment");
    expect(allocation.appointment.date).toBe("2025-07-01");
    expect(allocation.appointment.outOfNetwork).toBe(true);
    expect(log.events.at(-1)).toMatchObject({ type: "appointment.booked", networkStatus: "out_of_network" });
  });

  it("reopens the slot when the appointment cannot be written", async () => {
    vi.spyOn(appointmentsStorage, "save").mockRejectedValueOnce(new Error("disk I/O error"));

    await expect(
      allocator.allocate(await request(afternoonConsult()), { contingentOnAuthorization: false })
    ).rejects.toThrow("disk I/O error");
    expect((await getSlot({ providerId: "201", date: "2025-07-01", time: "16:00" }))?.status).toBe("open");
  });
});
