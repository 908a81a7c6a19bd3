import { z } from 'zod';
import { ValidationError } from '../errors/CoreErrors';

export class ValidationUtils {
    /**
     * Parse input with a zod schema, raising ValidationError on failure
     */
    static parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, context: string): T {
        const result = schema.safeParse(input);
        if (!result.success) {
            throw ValidationError.fromZod(context, result.error.issues);
        }
        return result.data;
    }

    /**
     * Case-insensitive comparison key for display names
     */
    static nameKey(name: string): string {
        return name.trim().toLocaleLowerCase();
    }

    /**
     * Make a string safe to use inside a file name
     */
    static fileKey(value: string): string {
        return value.replace(/[^A-Za-z0-9._-]/g, '_');
    }
}
