/**
 * Initial importance for new memories.
 *
 * Zero-LLM heuristics: explicit importance statements, decisions and
 * commitments raise the score, hedging lowers it, filler short-circuits to
 * trivial. Consolidation decays the score afterwards.
 */

import type { MemoryScope } from "./types.js";

export type ImportanceLevel = "critical" | "high" | "normal" | "low" | "trivial";

export interface ImportanceScore {
  score: number;
  level: ImportanceLevel;
  reasons: string[];
}

const CRITICAL_PATTERNS = [
  /\b(critical|crucial|essential|must|always|never)\b/i,
  /\b(important|remember this|don't forget)\b/i,
  /\b(actually|correction:?|i was wrong)\b/i,
];

const HIGH_PATTERNS = [
  /\b(decided|decision|chose|selected|approved)\b/i,
  /\b(course of action|coa|commander's intent|end ?state)\b/i,
  /\b(make sure|ensure|don't|do not|avoid)\b/i,
  /\b(deadline|due (date|by)|h-hour|d-day)\b/i,
  /\b(i (prefer|want|need))\b/i,
];

const LOW_PATTERNS = [
  /\b(maybe|perhaps|possibly|might|could be)\b/i,
  /\b(i think|i guess|not sure|uncertain)\b/i,
  /\b(kind of|sort of|somewhat)\b/i,
];

const TRIVIAL_PATTERNS = [
  /^(hi|hello|hey)[.!,]?\s*$/i,
  /^(ok|okay|sure|yes|no|yep|nope)[.!]?\s*$/i,
  /^(thanks|thank you|cheers)[.!]?\s*$/i,
  /^(got it|understood|roger|copy|noted)[.!]?\s*$/i,
  /^.{1,10}$/,
];

const SCOPE_BOOSTS: Record<MemoryScope, number> = {
  scenario: 0.05, // Scenario facts outlive a single conversation
  user: 0.03,
  agent: 0,
};

const IMPORTANT_TAGS = ["important", "critical", "preference", "decision", "lesson"];

export function importanceLevel(score: number): ImportanceLevel {
  if (score >= 0.9) return "critical";
  if (score >= 0.7) return "high";
  if (score >= 0.4) return "normal";
  if (score >= 0.2) return "low";
  return "trivial";
}

export function scoreImportance(content: string, scope: MemoryScope, tags: string[] = []): ImportanceScore {
  const trimmed = content.trim();
  if (TRIVIAL_PATTERNS.some((p) => p.test(trimmed))) {
    return { score: 0.1, level: "trivial", reasons: ["Trivial content (filler or very short)"] };
  }

  const reasons: string[] = [];
  let score = 0.5;

  if (CRITICAL_PATTERNS.some((p) => p.test(trimmed))) {
    score += 0.2;
    reasons.push("Critical marker");
  }
  if (HIGH_PATTERNS.some((p) => p.test(trimmed))) {
    score += 0.12;
    reasons.push("High importance marker");
  }
  if (LOW_PATTERNS.some((p) => p.test(trimmed))) {
    score -= 0.15;
    reasons.push("Uncertainty/hedging");
  }

  const scopeBoost = SCOPE_BOOSTS[scope];
  if (scopeBoost > 0) {
    score += scopeBoost;
    reasons.push(`Scope boost: ${scope}`);
  }

  if (trimmed.length > 200) score += Math.min((trimmed.length - 200) / 1000, 0.1);

  // Grid references, unit designators, dates
  if (/\b\d{2,}\b/.test(trimmed)) {
    score += 0.03;
    reasons.push("Contains specific details");
  }

  const importantTags = tags.filter((t) => IMPORTANT_TAGS.includes(t.toLowerCase()));
  if (importantTags.length > 0) {
    score += 0.05 * importantTags.length;
    reasons.push(`Important tags: ${importantTags.join(", ")}`);
  }

  const clamped = Math.round(Math.max(0, Math.min(1, score)) * 100) / 100;
  return { score: clamped, level: importanceLevel(clamped), reasons: reasons.slice(0, 5) };
}
