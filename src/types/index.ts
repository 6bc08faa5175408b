/**
 * Revenue-cycle engine type definitions.
 *
 * Patients, providers and payers; eligibility, authorization and denial
 * reference data; and the workflow records the engine drives.
 */

// Patient types
export type {
  Patient,
  PatientCoverage,
  CommunicationChannel,
  CommunicationPreferences,
  CreatePatientInput,
  UpdatePatientInput,
} from "./patient.js";
export { COMMUNICATION_CHANNELS } from "./patient.js";

// Provider and schedule types
export type {
  Provider,
  NetworkStatus,
  NetworkAgreement,
  SlotStatus,
  ScheduleSlot,
  SlotKey,
  CreateProviderInput,
  CreateNetworkAgreementInput,
  CreateScheduleSlotInput,
} from "./provider.js";
export { NETWORK_STATUSES, SLOT_STATUSES } from "./provider.js";

// Payer and service types
export type {
  Payer,
  PayerAccess,
  PortalNavigationMap,
  ElementLocator,
  LocatorType,
  CoverageField,
  EdiSegmentRule,
  EdiMappingRules,
  Service,
  CostCatalogEntry,
} from "./payer.js";
export { LOCATOR_TYPES, COVERAGE_FIELDS } from "./payer.js";

// Eligibility types
export type {
  CoverageStatus,
  CoverageData,
  ServiceLimitation,
  EligibilitySnapshot,
  VerificationMethod,
  VerificationStatus,
  VerificationLogEntry,
  CreateEligibilitySnapshotInput,
  CreateVerificationLogInput,
} from "./eligibility.js";
export {
  COVERAGE_STATUSES,
  VERIFICATION_METHODS,
  VERIFICATION_STATUSES,
} from "./eligibility.js";

// Authorization rule types
export type {
  DocumentKind,
  AuthorizationRule,
  AuthRequirement,
  UnknownAuthorizationRule,
} from "./authorization.js";
export { DOCUMENT_KINDS, DOCUMENT_KIND_LABELS } from "./authorization.js";

// Denial risk types
export type {
  RiskLevel,
  DenialPattern,
  ResolutionStrategy,
  RiskAssessment,
} from "./denial.js";
export { RISK_LEVELS, RISK_THRESHOLDS } from "./denial.js";

// Scheduling types
export type {
  DateRange,
  TimeWindow,
  AppointmentRequest,
  AppointmentRequestStatus,
  CreateAppointmentRequestInput,
  Appointment,
  AppointmentStatus,
  BookingState,
  WaitlistEntry,
  WaitlistStatus,
  DayPeriod,
  PatientCategory,
  OptimizationRule,
} from "./appointment.js";
export {
  APPOINTMENT_REQUEST_STATUSES,
  APPOINTMENT_STATUSES,
  WAITLIST_STATUSES,
} from "./appointment.js";

// Prior authorization types
export type {
  PaStatus,
  PaRequest,
  PaTransition,
  SubmissionMethod,
  DecisionOutcome,
  AuthDecision,
  CreatePaRequestInput,
} from "./pa-request.js";
export {
  PA_STATUSES,
  TERMINAL_PA_STATUSES,
  PA_TRANSITIONS,
  MAX_INFO_REQUESTS_EXCEEDED,
  SUBMISSION_METHODS,
  DECISION_OUTCOMES,
} from "./pa-request.js";

// Documentation package types
export type {
  PackageStatus,
  ClinicalDocument,
  AttachedDocument,
  DocumentationPackage,
  PackageReview,
} from "./documentation.js";
export { PACKAGE_STATUSES } from "./documentation.js";

// Staff alert types
export type {
  AlertType,
  AlertTrigger,
  AlertStatus,
  StaffAlert,
  AlertDraft,
} from "./alert.js";
export { ALERT_TYPES, ALERT_TRIGGERS, ALERT_STATUSES } from "./alert.js";

// Referral and outreach types
export type { Referral, ReferralStatus, OutreachTemplate } from "./referral.js";
export { REFERRAL_STATUSES } from "./referral.js";

// Reference data
export type { ReferenceData } from "./reference.js";

// Events
export type { EngineEvent, EngineEventType, EventListener } from "./events.js";
