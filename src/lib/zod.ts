import type { ZodError } from 'zod';

export function formatZodError(error: ZodError): { error: string; issues: typeof error.issues } {
    return {
        error: error.issues
            .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
            .join('; '),
        issues: error.issues,
    };
}
