/**
 * Authorization Rule Resolver
 *
 * Synchronous lookup of prior-authorization and referral requirements
 * for a (payer, service) pair. Unknown pairs fail open and are recorded
 * as reference-data gaps.
 */

import type {
  AuthorizationRule,
  AuthRequirement,
  UnknownAuthorizationRule,
} from "../types/authorization.js";

function pairKey(payerId: string, serviceCode: string): string {
  return `${payerId}::${serviceCode}`;
}

export class AuthRuleResolver {
  private rules = new Map<string, AuthorizationRule>();
  private unknown = new Map<string, UnknownAuthorizationRule>();

  constructor(
    rules: AuthorizationRule[],
    private now: () => Date = () => new Date()
  ) {
    this.load(rules);
  }

  /**
   * Replace the rule table. Recorded gaps are kept.
   */
  load(rules: AuthorizationRule[]): void {
    this.rules = new Map(rules.map((rule) => [pairKey(rule.payerId, rule.serviceCode), rule]));
  }

  resolve(payerId: string, serviceCode: string): AuthRequirement {
    const key = pairKey(payerId, serviceCode);
    const rule = this.rules.get(key);

    if (!rule) {
      const gap = this.unknown.get(key);
      if (gap) {
        gap.occurrences++;
      } else {
        this.unknown.set(key, { payerId, serviceCode, firstSeenAt: this.now(), occurrences: 1 });
      }
      console.warn(`[auth-rules] No authorization rule for ${payerId} / ${serviceCode}; assuming no PA or referral`);

      return {
        payerId,
        serviceCode,
        paRequired: false,
        referralRequired: false,
        requiredDocs: [],
        necessityKeywords: [],
        ruleFound: false,
      };
    }

    return {
      payerId,
      serviceCode,
      paRequired: rule.paRequired,
      referralRequired: rule.referralRequired,
      requiredDocs: [...rule.requiredDocs],
      necessityKeywords: [...rule.necessityKeywords],
      ruleFound: true,
      ...(rule.payerAuthPhone && { payerAuthPhone: rule.payerAuthPhone }),
      ...(rule.payerPortalUrl && { payerPortalUrl: rule.payerPortalUrl }),
    };
  }

  /** Pairs looked up without a rule, oldest first */
  gaps(): UnknownAuthorizationRule[] {
    return [...this.unknown.values()].map((gap) => ({ ...gap }));
  }
}
