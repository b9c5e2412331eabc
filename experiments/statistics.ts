import type { RunningStat, VariantMetricStats } from "./types.js";

export interface WelchResult {
  readonly tStatistic: number;
  readonly degreesOfFreedom: number;
  readonly pValue: number;
}

const LANCZOS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
  1.5056327351493116e-7,
];
const BETA_MAX_ITERATIONS = 300;
const BETA_EPSILON = 3e-14;
const BETA_FPMIN = 1e-300;

export const EMPTY_STAT: RunningStat = { count: 0, mean: 0, m2: 0 };

/** Welford's online update. */
export function updateStat(stat: RunningStat, value: number): RunningStat {
  const count = stat.count + 1;
  const delta = value - stat.mean;
  const mean = stat.mean + delta / count;
  return { count, mean, m2: stat.m2 + delta * (value - mean) };
}

/** Sample variance (n − 1); zero below two observations. */
export function variance(stat: RunningStat): number {
  return stat.count > 1 ? stat.m2 / (stat.count - 1) : 0;
}

export function describeStat(stat: RunningStat): VariantMetricStats {
  const v = variance(stat);
  return { count: stat.count, mean: stat.mean, variance: v, stdDev: Math.sqrt(v) };
}

/**
 * Two-sided Welch's t-test of B against A. Fewer than two samples on
 * either side yields t = 0 and p = 1.
 */
export function welchTTest(a: RunningStat, b: RunningStat): WelchResult {
  if (a.count < 2 || b.count < 2) {
    return { tStatistic: 0, degreesOfFreedom: 0, pValue: 1 };
  }

  const seA = variance(a) / a.count;
  const seB = variance(b) / b.count;
  const se2 = seA + seB;
  const diff = b.mean - a.mean;

  if (se2 === 0) {
    const df = a.count + b.count - 2;
    if (diff === 0) return { tStatistic: 0, degreesOfFreedom: df, pValue: 1 };
    return { tStatistic: diff > 0 ? Infinity : -Infinity, degreesOfFreedom: df, pValue: 0 };
  }

  const t = diff / Math.sqrt(se2);
  const df = (se2 * se2) / ((seA * seA) / (a.count - 1) + (seB * seB) / (b.count - 1));

  return { tStatistic: t, degreesOfFreedom: df, pValue: studentTwoSidedP(t, df) };
}

/** Cohen's d of B against A using the pooled standard deviation. */
export function cohensD(a: RunningStat, b: RunningStat): number {
  const dof = a.count + b.count - 2;
  if (dof <= 0) return 0;

  const pooled = Math.sqrt(((a.count - 1) * variance(a) + (b.count - 1) * variance(b)) / dof);
  return pooled > 0 ? (b.mean - a.mean) / pooled : 0;
}

export function studentTwoSidedP(t: number, df: number): number {
  if (!Number.isFinite(t)) return 0;
  if (df <= 0) return 1;
  const p = regularizedIncompleteBeta(df / (df + t * t), df / 2, 0.5);
  return Math.min(1, Math.max(0, p));
}

export function lnGamma(x: number): number {
  if (x < 0.5) {
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - lnGamma(1 - x);
  }

  const z = x - 1;
  let sum = LANCZOS[0] ?? 0;
  for (let i = 1; i < LANCZOS.length; i++) {
    sum += (LANCZOS[i] ?? 0) / (z + i);
  }
  const t = z + 7.5;
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(sum);
}

/** I_x(a, b), evaluated with a Lentz continued fraction. */
export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const front = Math.exp(
    lnGamma(a + b) - lnGamma(a) - lnGamma(b) + a * Math.log(x) + b * Math.log(1 - x),
  );

  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(x, a, b)) / a;
  }
  return 1 - (front * betaContinuedFraction(1 - x, b, a)) / b;
}

function betaContinuedFraction(x: number, a: number, b: number): number {
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;

  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < BETA_FPMIN) d = BETA_FPMIN;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= BETA_MAX_ITERATIONS; m++) {
    const m2 = 2 * m;

    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < BETA_FPMIN) d = BETA_FPMIN;
    c = 1 + aa / c;
    if (Math.abs(c) < BETA_FPMIN) c = BETA_FPMIN;
    d = 1 / d;
    h *= d * c;

    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < BETA_FPMIN) d = BETA_FPMIN;
    c = 1 + aa / c;
    if (Math.abs(c) < BETA_FPMIN) c = BETA_FPMIN;
    d = 1 / d;
    const delta = d * c;
    h *= delta;

    if (Math.abs(delta - 1) < BETA_EPSILON) break;
  }

  return h;
}
