import fs from "fs";
import { z } from "zod";
import type { FinanceConfig, TransferDutyBracket } from "./types";

export const DEFAULT_TRANSFER_DUTY_BRACKETS: TransferDutyBracket[] = [
  { upTo: 1210000, base: 0, rate: 0, over: 0 },
  { upTo: 1663800, base: 0, rate: 0.03, over: 1210000 },
  { upTo: 2329300, base: 13614, rate: 0.06, over: 1663800 },
  { upTo: 2994800, base: 53544, rate: 0.08, over: 2329300 },
  { upTo: 13310000, base: 106784, rate: 0.11, over: 2994800 },
  { upTo: Infinity, base: 1241456, rate: 0.13, over: 13310000 },
];

export const DEFAULT_FINANCE_CONFIG: FinanceConfig = {
  transferDutyBrackets: DEFAULT_TRANSFER_DUTY_BRACKETS,
  interestRate: 0.1075, // prime
  bondTermYears: 20,
  monthlyItems: {
    insurance: true,
    maintenance: true,
    utilities: true,
    security: true,
  },
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const bracketSchema = z.object({
  // null marks the open-ended top bracket, since JSON has no Infinity
  upTo: z
    .number()
    .positive()
    .nullable()
    .transform((v) => v ?? Infinity),
  base: z.number().nonnegative(),
  rate: z.number().min(0).max(1),
  over: z.number().nonnegative(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

const financeConfigSchema = z.object({
  transferDutyBrackets: z
    .array(bracketSchema)
    .min(1)
    .refine(
      (brackets) =>
        brackets.every(
          (b, i) => i === 0 || b.upTo > (brackets[i - 1]?.upTo ?? 0)
        ),
      { message: "brackets must be in ascending order of upTo" }
    )
    .optional(),
  interestRate: z.number().min(0).max(1).optional(),
  bondTermYears: z.number().int().positive().optional(),
  monthlyItems: z
    .object({
      insurance: z.boolean().optional(),
      maintenance: z.boolean().optional(),
      utilities: z.boolean().optional(),
      security: z.boolean().optional(),
    })
    .optional(),
});

/**
 * Validate a partial finance config and merge it over the defaults.
 */
export function parseFinanceConfig(raw: unknown): FinanceConfig {
  const result = financeConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid finance config: ${formatIssues(result.error)}`
    );
  }

  const parsed = result.data;
  return {
    transferDutyBrackets:
      parsed.transferDutyBrackets ?? DEFAULT_FINANCE_CONFIG.transferDutyBrackets,
    interestRate: parsed.interestRate ?? DEFAULT_FINANCE_CONFIG.interestRate,
    bondTermYears: parsed.bondTermYears ?? DEFAULT_FINANCE_CONFIG.bondTermYears,
    monthlyItems: {
      ...DEFAULT_FINANCE_CONFIG.monthlyItems,
      ...parsed.monthlyItems,
    },
  };
}

export function loadFinanceConfig(file: string): FinanceConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error: unknown) {
    throw new ConfigError(
      `Could not read finance config ${file}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }
  return parseFinanceConfig(raw);
}

// rate is in percent here
const overridesSchema = z.object({
  rate: z.number().min(0).max(100).optional(),
  years: z.number().int().positive().optional(),
});

export interface FinanceOverrides {
  configFile?: string;
  /** Annual rate in percent, e.g. 10.75 */
  rate?: number;
  years?: number;
}

/**
 * Finance config from an optional file, with command-line rate and term
 * applied on top.
 */
export function resolveFinanceConfig(
  overrides: FinanceOverrides
): FinanceConfig {
  const result = overridesSchema.safeParse({
    rate: overrides.rate,
    years: overrides.years,
  });
  if (!result.success) {
    throw new ConfigError(
      `Invalid finance overrides: ${formatIssues(result.error)}`
    );
  }

  const base = overrides.configFile
    ? loadFinanceConfig(overrides.configFile)
    : DEFAULT_FINANCE_CONFIG;
  const { rate, years } = result.data;

  return {
    ...base,
    interestRate: rate !== undefined ? rate / 100 : base.interestRate,
    bondTermYears: years ?? base.bondTermYears,
  };
}

export interface AppConfig {
  vaultPath: string;
  financeConfigPath?: string;
  scraperTimeout: number;
  userAgent: string;
}

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const timeout = parseInt(env.SCRAPER_TIMEOUT ?? "30000", 10);

  return {
    vaultPath: env.VAULT_PATH || "./vault",
    financeConfigPath: env.FINANCE_CONFIG || undefined,
    scraperTimeout: Number.isNaN(timeout) ? 30000 : timeout,
    userAgent: env.SCRAPER_USER_AGENT || DEFAULT_USER_AGENT,
  };
}
