/**
 * PII Sanitizer
 *
 * Everything sent to the reasoning backend passes through here first. Rules
 * are ordered: identifiers and emails go before the digit-based rules so a
 * UUID or an address is redacted whole instead of piecemeal.
 *
 * Conservative by construction: a false positive costs a little context, a
 * false negative leaks data. After the rule pass the text is re-scanned; if
 * anything still matches after MAX_PASSES the whole text is withheld.
 */

import type { Candidate, SanitizedCandidate } from "@shared/schema";
import type { PhoneFormat, SanitizerConfig } from "../config/appConfig";
import { SANITIZER_CONSTANTS } from "../config/constants";

export type RedactionRule = {
  name: string;
  pattern: RegExp;
  replacement: string;
};

export const WITHHELD_PLACEHOLDER = "[MESSAGE_REDACTED]";

// Separators include every Unicode dash (en-dash, non-breaking hyphen, ...)
const PHONE_PATTERNS: Record<PhoneFormat, RegExp> = {
  // (555) 123-4567, 555.123.4567, +1 555 123 4567
  nanp: /(?:\+?\d{1,3}[\p{Pd}.\s]?)?\(?\d{3}\)?[\p{Pd}.\s]?\d{3}[\p{Pd}.\s]?\d{4}/gu,
  // +44 20 7946 0958, +971-50-123-4567
  international: /\+\d{1,3}(?:[\p{Pd}.\s]?\(?\d{1,4}\)?){2,5}/gu,
};

const EMAIL_RULE: RedactionRule = {
  name: "email",
  pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g,
  replacement: "[EMAIL_REDACTED]",
};

const UUID_RULE: RedactionRule = {
  name: "uuid",
  pattern: /\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi,
  replacement: "[ID_REDACTED]",
};

const PASSWORD_RULE: RedactionRule = {
  name: "password",
  // the value may not start with "[" so the rule never re-matches its own output
  pattern: /\b(password|passcode|passwd|pwd|pin)\b(\s*(?:[:=]|\bis\b)\s*)(?!\[)\S+/gi,
  replacement: "$1$2[PASSWORD_REDACTED]",
};

const IP_RULE: RedactionRule = {
  name: "ip",
  pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g,
  replacement: "[IP_REDACTED]",
};

// 13-19 digits, optionally grouped by spaces or dashes
const CARD_RULE: RedactionRule = {
  name: "card",
  pattern: /\b(?:\d[\p{Pd}\s]?){12,18}\d\b/gu,
  replacement: "[CARD_REDACTED]",
};

const SSN_RULE: RedactionRule = {
  name: "ssn",
  pattern: /\b\d{3}\p{Pd}\d{2}\p{Pd}\d{4}\b/gu,
  replacement: "[SSN_REDACTED]",
};

const ACCOUNT_RULE: RedactionRule = {
  name: "account",
  pattern: /\b\d{9,}\b/g,
  replacement: "[ACCOUNT_REDACTED]",
};

const TOKEN_RULE: RedactionRule = {
  name: "token",
  pattern: /\b[A-Za-z0-9]{32,}\b/g,
  replacement: "[TOKEN_REDACTED]",
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function knownIdentifierRule(identifiers: readonly string[]): RedactionRule | null {
  const literals = Array.from(new Set(identifiers))
    .filter((id) => id.length >= SANITIZER_CONSTANTS.MIN_KNOWN_IDENTIFIER_LENGTH)
    // longest first so an id never leaves a suffix of a longer one behind
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  if (literals.length === 0) return null;
  return {
    name: "known_id",
    pattern: new RegExp(`(?<![A-Za-z0-9])(?:${literals.join("|")})(?![A-Za-z0-9])`, "g"),
    replacement: "[ID_REDACTED]",
  };
}

function prefixedIdRule(prefixes: readonly string[]): RedactionRule | null {
  if (prefixes.length === 0) return null;
  return {
    name: "prefixed_id",
    pattern: new RegExp(`\\b(?:${prefixes.map(escapeRegExp).join("|")})[A-Za-z0-9-]+`, "g"),
    replacement: "[ID_REDACTED]",
  };
}

/**
 * Build the ordered rule list for a policy.
 */
export function buildRedactionRules(
  config: SanitizerConfig,
  knownIdentifiers: readonly string[] = [],
): RedactionRule[] {
  const rules: Array<RedactionRule | null> = [
    knownIdentifierRule(knownIdentifiers),
    UUID_RULE,
    prefixedIdRule(config.idPrefixes),
    EMAIL_RULE,
    PASSWORD_RULE,
    IP_RULE,
    CARD_RULE,
    SSN_RULE,
    ...config.phoneFormats.map((format): RedactionRule => ({
      name: `phone_${format}`,
      pattern: PHONE_PATTERNS[format],
      replacement: "[PHONE_REDACTED]",
    })),
    ACCOUNT_RULE,
    TOKEN_RULE,
  ];
  return rules.filter((r): r is RedactionRule => r !== null);
}

export class Sanitizer {
  private readonly rules: RedactionRule[];

  constructor(config: SanitizerConfig, knownIdentifiers: readonly string[] = []) {
    this.rules = buildRedactionRules(config, knownIdentifiers);
  }

  /**
   * Names of the rules that still match `text`. Empty means clean.
   */
  findViolations(text: string): string[] {
    return this.rules
      .filter((rule) => {
        rule.pattern.lastIndex = 0;
        const hit = rule.pattern.test(text);
        rule.pattern.lastIndex = 0;
        return hit;
      })
      .map((rule) => rule.name);
  }

  sanitize(text: string): string {
    let current = text;
    for (let pass = 0; pass < SANITIZER_CONSTANTS.MAX_PASSES; pass++) {
      current = this.applyRules(current);
      if (this.findViolations(current).length === 0) {
        return current;
      }
    }
    return WITHHELD_PLACEHOLDER;
  }

  sanitizeCandidate(candidate: Candidate): SanitizedCandidate {
    return {
      text: this.sanitize(candidate.message.text),
      person: candidate.message.person,
      timestamp: candidate.message.timestamp,
      similarityScore: candidate.similarityScore,
    };
  }

  private applyRules(text: string): string {
    let out = text;
    for (const rule of this.rules) {
      rule.pattern.lastIndex = 0;
      out = out.replace(rule.pattern, rule.replacement);
    }
    return out;
  }
}
