import type { KernelPolicy } from "../types/lmsr.js";

const optionalEnv = (key: string, fallback: string): string => {
  return process.env[key] ?? fallback;
};

const numericEnv = (key: string, fallback: number): number => {
  const raw = process.env[key]?.trim();
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid numeric env: ${key}=${raw}`);
  }
  return value;
};

const booleanEnv = (key: string, fallback: boolean): boolean => {
  const raw = process.env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  return raw === "true" || raw === "1";
};

/** Guard thresholds of the pricing kernel. Pools may override individual entries at creation. */
export const DEFAULT_KERNEL_POLICY: Readonly<KernelPolicy> = Object.freeze({
  expInputLimit: 128,
  balancedDeltaMax: 0.01,
  quadraticTauMax: 0.1,
  cubicTauMax: 0.5,
  limitWindow: 0.1,
  cubicDamping: 0.6,
  solverTolerance: 1e-6,
  solverMaxIterations: 256,
  alphaCeiling: 1,
});

function makeConfig() {
  return {
    get port(): number {
      return Number(optionalEnv("PORT", "3000"));
    },
    get host(): string {
      return optionalEnv("HOST", "0.0.0.0");
    },
    get nodeEnv(): string {
      return optionalEnv("NODE_ENV", "development");
    },
    get logLevel(): string {
      return optionalEnv("LOG_LEVEL", "info");
    },
    /** Default for new pools: route two-asset swaps through the balanced-regime surrogate. */
    get poolApproximation(): boolean {
      return booleanEnv("POOL_APPROXIMATION", true);
    },
    /** Default policy for new pools: DEFAULT_KERNEL_POLICY with SOLVER_* overrides. */
    get kernelPolicy(): KernelPolicy {
      return {
        ...DEFAULT_KERNEL_POLICY,
        solverTolerance: numericEnv("SOLVER_TOLERANCE", DEFAULT_KERNEL_POLICY.solverTolerance),
        solverMaxIterations: Math.max(
          1,
          Math.floor(numericEnv("SOLVER_MAX_ITERATIONS", DEFAULT_KERNEL_POLICY.solverMaxIterations))
        ),
      };
    },
  };
}

export const config = makeConfig();
