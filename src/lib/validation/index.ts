/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code uses this instead of importing Zod directly.
 * Re-exports `z` so schemas can be built without a direct zod dependency.
 */

import { z } from "zod";
import { DispatchError, ErrorCategory } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/**
 * Non-retryable error naming the offending field and why it was rejected.
 * `issues` holds every failure when a schema reports more than one;
 * `field`/`reason` always describe the first.
 */
export class ValidationError extends DispatchError {
	readonly field: string;
	readonly reason: string;
	readonly issues: readonly ValidationIssue[];

	constructor(field: string, reason: string, issues?: readonly ValidationIssue[]) {
		super(`${field}: ${reason}`, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { field });
		this.name = "ValidationError";
		this.field = field;
		this.reason = reason;
		this.issues = issues ?? [{ path: [field], message: reason }];
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			field: this.field,
			reason: this.reason,
		};
	}
}

function pathToField(path: readonly (string | number)[]): string {
	return path.length === 0 ? "(root)" : path.join(".");
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	const first = issues[0];
	const field = first === undefined ? "(root)" : pathToField(first.path);
	const reason = first?.message ?? "invalid value";
	return err(new ValidationError(field, reason, issues));
}
