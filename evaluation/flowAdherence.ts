export interface FlowAdherence {
  readonly expectedFlow: readonly string[];
  readonly actualFlow: readonly string[];
  readonly adherenceScore: number;
  readonly missedSteps: readonly string[];
  readonly extraSteps: readonly string[];
  readonly deviations: number;
  readonly sequenceCorrect: boolean;
}

export interface FlowTrace extends FlowAdherence {
  readonly taskId: string;
  readonly createdAt: string;
}

export function longestCommonSubsequence(a: readonly string[], b: readonly string[]): number {
  let previous = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? (previous[j - 1] ?? 0) + 1
          : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

/**
 * Compares the steps a workflow should take with the steps it took.
 * Deviations count the insertions and deletions needed to align the two
 * sequences along their longest common subsequence.
 */
export function checkFlowAdherence(
  expectedFlow: readonly string[],
  actualFlow: readonly string[],
): FlowAdherence {
  const lcs = longestCommonSubsequence(expectedFlow, actualFlow);
  const actualSet = new Set(actualFlow);
  const expectedSet = new Set(expectedFlow);

  const adherenceScore =
    expectedFlow.length === 0
      ? actualFlow.length === 0
        ? 1
        : 0
      : Math.min(1, Math.max(0, lcs / expectedFlow.length));

  return {
    expectedFlow: [...expectedFlow],
    actualFlow: [...actualFlow],
    adherenceScore,
    missedSteps: [...new Set(expectedFlow.filter((step) => !actualSet.has(step)))],
    extraSteps: [...new Set(actualFlow.filter((step) => !expectedSet.has(step)))],
    deviations: expectedFlow.length - lcs + (actualFlow.length - lcs),
    sequenceCorrect:
      expectedFlow.length === actualFlow.length && expectedFlow.every((step, i) => step === actualFlow[i]),
  };
}
