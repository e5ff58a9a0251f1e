import { z } from 'zod';

const EnvSchema = z
    .object({
        NODE_ENV: z
            .enum(['development', 'test', 'production'])
            .default('development'),

        LOG_LEVEL: z
            .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
            .default('info'),

        // Dataset and graph cache locations
        ONCOQA_DATASET_PATH: z.string().min(1).optional(),
        ONCOQA_GRAPH_CACHE_PATH: z.string().min(1).optional(),

        // Tokenization
        ONCOQA_MIN_TOKEN_LENGTH: z.coerce
            .number()
            .int()
            .min(1)
            .default(3),
        ONCOQA_CONCEPT_MIN_LENGTH: z.coerce
            .number()
            .int()
            .min(1)
            .default(4),

        // Knowledge graph
        ONCOQA_MAX_KEYWORDS: z.coerce
            .number()
            .int()
            .min(2)
            .default(24),

        // Closest-match backend
        ONCOQA_CLOSEST_MATCH_CUTOFF: z.coerce
            .number()
            .min(0)
            .max(1)
            .default(0.4),
    })
    .superRefine((data, ctx) => {
        if (data.ONCOQA_CONCEPT_MIN_LENGTH < data.ONCOQA_MIN_TOKEN_LENGTH) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'ONCOQA_CONCEPT_MIN_LENGTH must not be below ONCOQA_MIN_TOKEN_LENGTH',
                path: ['ONCOQA_CONCEPT_MIN_LENGTH'],
            });
        }
    });

export type EnvConfig = z.infer<typeof EnvSchema>;

export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        const errors = result.error.issues
            .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
            .join('\n');
        console.error(`Environment validation failed:\n${errors}`);
        process.exit(1);
    }
    return result.data;
}
