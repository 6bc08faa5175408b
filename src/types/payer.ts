/**
 * Payer and service reference types.
 *
 * A payer is reached through one of two channels: a structured EDI
 * exchange (X12 270/271) or a web portal navigated with an element map.
 */

/**
 * How an element on a payer portal page is located.
 */
export type LocatorType = "id" | "name" | "xpath" | "css";

/** All locator types for iteration */
export const LOCATOR_TYPES: readonly LocatorType[] = [
  "id",
  "name",
  "xpath",
  "css",
] as const;

/**
 * Element locator from a portal navigation map.
 */
export interface ElementLocator {
  type: LocatorType;
  value: string;
}

/**
 * Coverage fields the engine can extract from a payer response.
 */
export type CoverageField =
  | "coverageStatus"
  | "planName"
  | "groupNumber"
  | "effectiveDate"
  | "terminationDate"
  | "deductibleAmount"
  | "deductibleMetYtd"
  | "coinsurancePercentage"
  | "copaySpecialist"
  | "copayPcp"
  | "outOfPocketMax"
  | "outOfPocketMetYtd"
  | "referralRequired"
  | "pcpDesignation";

/** All coverage fields for iteration */
export const COVERAGE_FIELDS: readonly CoverageField[] = [
  "coverageStatus",
  "planName",
  "groupNumber",
  "effectiveDate",
  "terminationDate",
  "deductibleAmount",
  "deductibleMetYtd",
  "coinsurancePercentage",
  "copaySpecialist",
  "copayPcp",
  "outOfPocketMax",
  "outOfPocketMetYtd",
  "referralRequired",
  "pcpDesignation",
] as const;

/**
 * Element map that drives portal-based eligibility extraction.
 */
export interface PortalNavigationMap {
  loginUrl: string;

  /** Eligibility search page, when it differs from the post-login landing page */
  eligibilityUrl?: string;

  login: {
    username: ElementLocator;
    password: ElementLocator;
    submit: ElementLocator;
  };

  eligibilitySearch: {
    memberId: ElementLocator;
    dateOfBirth?: ElementLocator;
    submit: ElementLocator;
  };

  /** Elements to read for each coverage field */
  extraction: Partial<Record<CoverageField, ElementLocator>>;
}

/**
 * Where a value lives inside an X12 response.
 * `qualifier` matches element 1 of the segment; `element` is the
 * 1-based element index holding the value.
 */
export interface EdiSegmentRule {
  segment: string;
  qualifier?: string;
  element: number;
}

/**
 * Mapping rules for the EDI channel.
 */
export interface EdiMappingRules {
  /** Sender and receiver identifiers placed in the ISA/GS envelope */
  senderId: string;
  receiverId: string;

  /** Where each coverage field is read from in the 271 response */
  response: Partial<Record<CoverageField, EdiSegmentRule>>;
}

/**
 * Access descriptors for a payer.
 * Credentials are never stored here; `credentialsEnvPrefix` names the
 * environment variables that hold them.
 */
export interface PayerAccess {
  portalUrl?: string;
  ediEndpoint?: string;

  /** Endpoint accepting electronic prior-authorization submissions */
  priorAuthEndpoint?: string;

  faxNumber?: string;
  authPhone?: string;

  /** Prefix for `<PREFIX>_PORTAL_USERNAME`, `<PREFIX>_EDI_API_KEY`, ... */
  credentialsEnvPrefix: string;
}

/**
 * An insurance payer (plan family).
 */
export interface Payer {
  /** Internal identifier (e.g., "aetna-ppo") */
  id: string;

  /** Display name (e.g., "Aetna PPO") */
  name: string;

  access: PayerAccess;

  portalMap?: PortalNavigationMap;

  ediRules?: EdiMappingRules;
}

/**
 * A billable service from the practice's catalog.
 */
export interface Service {
  /** CPT or internal code (e.g., "CPT70551") */
  code: string;

  description: string;

  /** Display range (e.g., "$800 - $1200") */
  typicalCostRange?: string;

  /** Specialties whose providers perform this service */
  specialties: string[];
}

/**
 * Negotiated rate for a service with a payer, optionally provider specific.
 */
export interface CostCatalogEntry {
  id: string;
  serviceCode: string;
  payerId: string;
  providerId?: string;
  negotiatedRate: number;
}
