/**
 * Engine wiring.
 *
 * Builds every component from configuration and the reference tables in
 * the store, and subscribes the alert dispatcher to the event bus.
 * Collaborators with side effects outside the process (payer channels,
 * the fax gateway, the clinical document source) can be swapped in.
 */

import type { EngineConfig } from "../config.js";
import type { ReferenceData } from "../types/reference.js";
import { loadReferenceData } from "../storage/index.js";
import { AuthRuleResolver } from "./auth-rule-resolver.js";
import { DenialRiskPredictor } from "./denial-risk-predictor.js";
import {
  DocumentationBuilder,
  type ClinicalDocumentSource,
  type RationaleSummarizer,
} from "./documentation-builder.js";
import { EligibilityVerifier } from "./eligibility-verifier.js";
import { EdiConnector } from "./edi-connector.js";
import { PortalConnector } from "./portal-connector.js";
import { createConnectorRegistry, type ConnectorRegistry } from "./payer-connector.js";
import { OutboxFaxGateway, type FaxGateway } from "./fax-gateway.js";
import { ReferralRegistry } from "./referral-registry.js";
import { PaStateMachine } from "./pa-state-machine.js";
import { SchedulingAllocator } from "./scheduling-allocator.js";
import { AlertDispatcher } from "./alert-dispatcher.js";
import { OutreachComposer } from "./outreach.js";
import { CostEstimator } from "./cost-estimator.js";
import { Orchestrator } from "./orchestrator.js";
import { EventBus } from "./event-bus.js";
import type { PackagePdfInput, RenderedPdf } from "./package-pdf.js";

export interface EngineOverrides {
  connectors?: ConnectorRegistry;
  fax?: FaxGateway;
  documents?: ClinicalDocumentSource;
  summarizer?: RationaleSummarizer;
  renderPdf?: (input: PackagePdfInput, outDir: string) => Promise<RenderedPdf>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface Engine {
  config: EngineConfig;
  events: EventBus;
  resolver: AuthRuleResolver;
  predictor: DenialRiskPredictor;
  verifier: EligibilityVerifier;
  builder: DocumentationBuilder;
  referrals: ReferralRegistry;
  paStateMachine: PaStateMachine;
  allocator: SchedulingAllocator;
  alerts: AlertDispatcher;
  outreach: OutreachComposer;
  costs: CostEstimator;
  orchestrator: Orchestrator;

  /** Re-read the reference tables from the store */
  reloadReference(): Promise<ReferenceData>;
}

export async function createEngine(config: EngineConfig, overrides: EngineOverrides = {}): Promise<Engine> {
  const reference = await loadReferenceData();
  const events = new EventBus();
  const { publish } = events;
  const clock = overrides.now ? { now: overrides.now } : {};
  const sleeper = overrides.sleep ? { sleep: overrides.sleep } : {};

  const connectors =
    overrides.connectors ??
    createConnectorRegistry({
      edi: new EdiConnector(),
      portal: new PortalConnector({ headless: config.headless }),
    });
  const fax = overrides.fax ?? new OutboxFaxGateway(config.outboxDir);

  const resolver = new AuthRuleResolver(reference.authorizationRules, overrides.now);
  const predictor = new DenialRiskPredictor(reference);
  const referrals = new ReferralRegistry(overrides.now);
  const outreach = new OutreachComposer(reference.outreachTemplates);
  const costs = new CostEstimator(reference.costCatalog);

  const verifier = new EligibilityVerifier({ config, connectors, publish, ...sleeper, ...clock });
  const builder = new DocumentationBuilder({
    resolver,
    ...(overrides.documents && { source: overrides.documents }),
    ...(overrides.summarizer && { summarizer: overrides.summarizer }),
    ...clock,
  });

  // The allocator and the orchestrator refer to each other through these hooks
  let orchestrator: Orchestrator | undefined;
  const allocator = new SchedulingAllocator({
    config,
    reference,
    resolver,
    publish,
    onWaitlistFulfilled: async (entry, appointment) => {
      if (orchestrator) await orchestrator.handleWaitlistFulfilled(entry, appointment);
    },
    ...clock,
  });

  const paStateMachine = new PaStateMachine({
    config,
    resolver,
    predictor,
    builder,
    connectors,
    fax,
    referrals,
    publish,
    confirmAppointment: (appointmentId) => allocator.confirmAppointment(appointmentId),
    ...(overrides.renderPdf && { renderPdf: overrides.renderPdf }),
    ...sleeper,
    ...clock,
  });

  orchestrator = new Orchestrator({
    verifier,
    resolver,
    predictor,
    referrals,
    allocator,
    paStateMachine,
    costs,
    publish,
    ...clock,
  });

  const alerts = new AlertDispatcher({ config, outreach, ...clock });
  events.subscribe(async (event) => {
    await alerts.observe(event);
  });

  return {
    config,
    events,
    resolver,
    predictor,
    verifier,
    builder,
    referrals,
    paStateMachine,
    allocator,
    alerts,
    outreach,
    costs,
    orchestrator,

    async reloadReference(): Promise<ReferenceData> {
      const fresh = await loadReferenceData();
      resolver.load(fresh.authorizationRules);
      predictor.load(fresh);
      allocator.load(fresh);
      outreach.load(fresh.outreachTemplates);
      costs.load(fresh.costCatalog);
      console.log(`[engine] Reference data reloaded: ${fresh.authorizationRules.length} authorization rules`);
      return fresh;
    },
  };
}
