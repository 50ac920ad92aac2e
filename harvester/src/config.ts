import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalNonEmptyString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().min(1).optional()
);

const booleanFlag = (fallback: boolean) =>
  z.preprocess((value) => {
    if (typeof value !== "string") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (normalized === "") {
      return undefined;
    }
    return !["false", "0", "no", "off"].includes(normalized);
  }, z.boolean().default(fallback));

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3002),
    LOG_LEVEL: z.string().min(1).default("info"),
    USER_AGENT: z
      .string()
      .min(1)
      .default(
        "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36"
      ),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    REQUEST_DELAY_MIN_MS: z.coerce.number().int().nonnegative().default(1500),
    REQUEST_DELAY_MAX_MS: z.coerce.number().int().nonnegative().default(4000),
    SOURCES_FILE: z.string().min(1).default("harvester/config/sources.json"),
    LEXICON_FILE: z.string().min(1).default("harvester/config/lexicon.json"),
    VENDOR_QUERY_FILE: z.string().min(1).default("harvester/config/queries/vendor-search.graphql"),
    CACHE_FILE: z.string().min(1).default("data/cache/harvest-cache.json"),
    OUTPUT_FILE: z.string().min(1).default("data/processed/products.json"),
    DIAGNOSTICS_DIR: optionalNonEmptyString,
    BROWSER_EXECUTABLE_PATH: optionalNonEmptyString,
    BROWSER_HEADLESS: booleanFlag(true)
  })
  .refine((env) => env.REQUEST_DELAY_MAX_MS >= env.REQUEST_DELAY_MIN_MS, {
    message: "REQUEST_DELAY_MAX_MS must be >= REQUEST_DELAY_MIN_MS",
    path: ["REQUEST_DELAY_MAX_MS"]
  });

export type AppConfig = Readonly<z.infer<typeof EnvSchema>>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  return Object.freeze(EnvSchema.parse(env));
}

export const config: AppConfig = parseConfig(process.env);
