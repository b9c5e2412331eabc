import { InvalidRequestError } from "../shared/errors.js";
import {
  contentTokens,
  normalizePhrase,
  splitSentences,
  stemSet,
  tokenize,
} from "../shared/text.js";
import type { EvaluationContext, MetricScore, MetricScorer } from "./types.js";

const MIN_UNIQUE_TOKEN_RATIO = 0.6;
const SUPPORTED_SENTENCE_RATIO = 0.5;
const MAX_FEEDBACK_SENTENCES = 3;

/**
 * Exact (normalized) match or phrase containment scores 1; otherwise the
 * share of expected keywords present in the response.
 */
export const accuracyScorer: MetricScorer = {
  name: "accuracy",
  score(input: EvaluationContext): MetricScore {
    if (input.expectedOutput === undefined || input.expectedOutput.trim().length === 0) {
      throw new InvalidRequestError("accuracy scoring requires expected_output");
    }

    const expected = normalizePhrase(input.expectedOutput);
    const response = normalizePhrase(input.response);

    if (expected.length > 0 && expected === response) {
      return { score: 1, feedback: "exact match" };
    }
    if (expected.length > 0 && ` ${response} `.includes(` ${expected} `)) {
      return { score: 1, feedback: "expected answer found in response" };
    }

    const expectedKeywords = [...stemSet(keywordsOrTokens(input.expectedOutput))];
    const responseKeywords = stemSet(tokenize(input.response));
    if (expectedKeywords.length === 0) {
      return { score: 0, feedback: "expected output has no comparable terms" };
    }
    const found = expectedKeywords.filter((k) => responseKeywords.has(k));
    const missing = expectedKeywords.filter((k) => !responseKeywords.has(k));

    return {
      score: found.length / expectedKeywords.length,
      feedback: missing.length > 0 ? `missing: ${missing.join(", ")}` : "all expected keywords present",
    };
  },
};

/** Share of context (or prompt) keywords the response addresses. */
export const relevanceScorer: MetricScorer = {
  name: "relevance",
  score(input: EvaluationContext): MetricScore {
    const reference = input.context ?? input.prompt;
    const keywords = [...stemSet(contentTokens(reference))];
    if (keywords.length === 0) {
      return { score: 1, feedback: "no reference keywords to compare" };
    }

    const responseKeywords = stemSet(tokenize(input.response));
    const matched = keywords.filter((k) => responseKeywords.has(k)).length;

    return {
      score: matched / keywords.length,
      feedback: `${matched}/${keywords.length} reference keywords addressed`,
    };
  },
};

/**
 * Heuristic consistency check: lexical variety, repeated sentences and
 * whether the response ends cleanly.
 */
export const coherenceScorer: MetricScorer = {
  name: "coherence",
  score(input: EvaluationContext): MetricScore {
    const tokens = tokenize(input.response);
    if (tokens.length === 0) {
      return { score: 0, feedback: "empty response" };
    }

    const uniqueRatio = new Set(tokens).size / tokens.length;
    const lexical = Math.min(1, uniqueRatio / MIN_UNIQUE_TOKEN_RATIO);

    const sentences = splitSentences(input.response);
    const distinct = new Set(sentences.map(normalizePhrase)).size;
    const repeated = sentences.length - distinct;
    const variety = sentences.length > 0 ? 1 - repeated / sentences.length : 1;

    const termination = /[.!?)"'`]\s*$/.test(input.response.trim()) ? 1 : 0.5;

    const problems: string[] = [];
    if (lexical < 1) problems.push("repetitive wording");
    if (repeated > 0) problems.push(`${repeated} repeated sentence(s)`);
    if (termination < 1) problems.push("response appears truncated");

    return {
      score: 0.4 * lexical + 0.4 * variety + 0.2 * termination,
      feedback: problems.length > 0 ? problems.join("; ") : "consistent",
    };
  },
};

/**
 * Share of response sentences backed by the grounding documents. A sentence
 * counts as supported when at least half of its keywords appear in them.
 */
export const groundednessScorer: MetricScorer = {
  name: "groundedness",
  score(input: EvaluationContext): MetricScore {
    const sources = input.groundingDocs && input.groundingDocs.length > 0
      ? input.groundingDocs
      : input.context !== undefined
        ? [input.context]
        : [];
    if (sources.length === 0) {
      return { score: 1, feedback: "no grounding documents; nothing to verify" };
    }

    const supportedTerms = stemSet(sources.flatMap((doc) => tokenize(doc)));
    const unsupported: string[] = [];
    let considered = 0;

    for (const sentence of splitSentences(input.response)) {
      const keywords = [...stemSet(contentTokens(sentence))];
      if (keywords.length === 0) continue;

      considered++;
      const backed = keywords.filter((k) => supportedTerms.has(k)).length;
      if (backed / keywords.length < SUPPORTED_SENTENCE_RATIO) {
        unsupported.push(sentence);
      }
    }

    if (considered === 0) {
      return { score: 1, feedback: "no verifiable claims" };
    }

    return {
      score: (considered - unsupported.length) / considered,
      feedback:
        unsupported.length > 0
          ? `unsupported: ${unsupported.slice(0, MAX_FEEDBACK_SENTENCES).map((s) => `"${s}"`).join(" ")}`
          : "all claims supported",
    };
  },
};

export const BUILTIN_SCORERS: readonly MetricScorer[] = [
  accuracyScorer,
  relevanceScorer,
  coherenceScorer,
  groundednessScorer,
];

function keywordsOrTokens(text: string): readonly string[] {
  const keywords = contentTokens(text);
  return keywords.length > 0 ? keywords : tokenize(text);
}
