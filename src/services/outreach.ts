/**
 * Outreach Composer
 *
 * Renders the patient-facing message staff send when a payer rejects a
 * verification for missing or wrong patient information.
 */

import type { OutreachTemplate } from "../types/referral.js";
import type { Patient } from "../types/patient.js";
import type { Payer } from "../types/payer.js";

/**
 * Which piece of patient information a verification error points at.
 */
const MISSING_FIELD_BY_ERROR: Record<string, string> = {
  MISSING_MEMBER_ID: "Policy Number",
  INVALID_MEMBER_ID: "Policy Number",
  SUBSCRIBER_NOT_FOUND: "Policy Number",
  INVALID_NAME: "Patient Name",
  INCOMPLETE_COVERAGE: "Insurance Information",
};

export function missingFieldForError(errorCode: string): string {
  return MISSING_FIELD_BY_ERROR[errorCode] ?? "Insurance Information";
}

export interface OutreachContext {
  patient: Patient;
  payer?: Payer;
  missingInfoField: string;
  clinicName: string;
  portalUrl: string;
}

/**
 * Template for a field on the patient's preferred channel, else the
 * first template for that field on any channel.
 */
export function selectTemplate(
  templates: OutreachTemplate[],
  missingInfoField: string,
  channel: Patient["communication"]["preferredChannel"]
): OutreachTemplate | undefined {
  const field = missingInfoField.toLowerCase();
  const forField = templates.filter((t) => t.missingInfoField.toLowerCase() === field);
  return forField.find((t) => t.channel === channel) ?? forField[0];
}

export function fillTemplate(text: string, values: Record<string, string>): string {
  return text.replace(/\[([^\]]+)\]/g, (placeholder, name: string) => values[name] ?? placeholder);
}

export class OutreachComposer {
  constructor(private templates: OutreachTemplate[]) {}

  load(templates: OutreachTemplate[]): void {
    this.templates = templates;
  }

  /**
   * Message for the patient, or null when no template covers the field.
   */
  compose(context: OutreachContext): string | null {
    const template = selectTemplate(
      this.templates,
      context.missingInfoField,
      context.patient.communication.preferredChannel
    );
    if (!template) return null;

    return fillTemplate(template.templateText, {
      "Patient Name": context.patient.fullName,
      Missing_Info_Field: context.missingInfoField,
      Payer_Name: context.payer?.name ?? "insurance",
      "Clinic Name": context.clinicName,
      "Secure Portal URL": context.portalUrl,
    });
  }
}
