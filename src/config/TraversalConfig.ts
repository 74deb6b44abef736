import { z } from "zod";

export type LogLevel = "debug" | "info" | "warn" | "error";

const BooleanFlag = z
    .string()
    .trim()
    .toLowerCase()
    .transform((value, ctx) => {
        if (value === "true" || value === "1" || value === "on") return true;
        if (value === "false" || value === "0" || value === "off") return false;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean flag, got '${value}'` });
        return z.NEVER;
    });

const EnvSchema = z.object({
    TREE_ORDER_COLLECTION_CACHE: BooleanFlag.optional(),
    TREE_ORDER_MAX_WALK_STEPS: z.coerce.number().int().positive().optional(),
    TREE_ORDER_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
    TREE_ORDER_DEBUG: BooleanFlag.optional()
});

const SettingsSchema = z.object({
    collectionCache: z.boolean(),
    maxWalkSteps: z.number().int().positive().nullable(),
    logLevel: z.enum(["debug", "info", "warn", "error"])
});

export type TraversalSettings = z.infer<typeof SettingsSchema>;

const DEFAULTS: TraversalSettings = {
    collectionCache: true,
    maxWalkSteps: null,
    logLevel: "info"
};

/**
 * Runtime settings for walkers and live collections.
 * Values come from TREE_ORDER_* environment variables and can be overridden
 * programmatically; every override is validated before it is applied.
 */
export class TraversalConfig {
    private static settings: TraversalSettings = { ...DEFAULTS };

    static initialize(env: NodeJS.ProcessEnv = process.env): void {
        const parsed = EnvSchema.safeParse({
            TREE_ORDER_COLLECTION_CACHE: env.TREE_ORDER_COLLECTION_CACHE || undefined,
            TREE_ORDER_MAX_WALK_STEPS: env.TREE_ORDER_MAX_WALK_STEPS || undefined,
            TREE_ORDER_LOG_LEVEL: env.TREE_ORDER_LOG_LEVEL?.toLowerCase() || undefined,
            TREE_ORDER_DEBUG: env.TREE_ORDER_DEBUG || undefined
        });

        this.settings = { ...DEFAULTS };
        if (!parsed.success) {
            console.warn("[TraversalConfig] Ignoring invalid environment:", parsed.error.issues.map(issue => ({
                variable: issue.path.join("."),
                message: issue.message
            })));
            return;
        }

        const vars = parsed.data;
        this.settings = {
            collectionCache: vars.TREE_ORDER_COLLECTION_CACHE ?? DEFAULTS.collectionCache,
            maxWalkSteps: vars.TREE_ORDER_MAX_WALK_STEPS ?? DEFAULTS.maxWalkSteps,
            logLevel: vars.TREE_ORDER_LOG_LEVEL ?? (vars.TREE_ORDER_DEBUG ? "debug" : DEFAULTS.logLevel)
        };
    }

    static get(): Readonly<TraversalSettings> {
        return this.settings;
    }

    static set(overrides: Partial<TraversalSettings>): void {
        this.settings = SettingsSchema.parse({ ...this.settings, ...overrides });
    }

    static resetForTesting(): void {
        this.settings = { ...DEFAULTS };
    }
}

// Auto-initialize on module load
TraversalConfig.initialize();
