// =============================================================================
// API VALIDATION — Shared request validation for route handlers
// =============================================================================

import { type ApiResponse, errorResponse } from "./router.js";

// =============================================================================
// FIELD SPEC VALIDATION
// =============================================================================

export type FieldSpec = "string" | "number" | "boolean" | "string?" | "number?" | "boolean?";

type FieldType<S extends FieldSpec> = S extends "string"
	? string
	: S extends "string?"
		? string | undefined
		: S extends "number"
			? number
			: S extends "number?"
				? number | undefined
				: S extends "boolean"
					? boolean
					: boolean | undefined;

export type ValidatedBody<F extends Record<string, FieldSpec>> = { [K in keyof F]: FieldType<F[K]> };

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The field's value, undefined when an optional field is absent, null when invalid. */
function readField(value: unknown, spec: FieldSpec): string | number | boolean | undefined | null {
	const optional = spec.endsWith("?");
	if (value === undefined || value === null) return optional ? undefined : null;
	const expectedType = optional ? spec.slice(0, -1) : spec;
	switch (expectedType) {
		case "string":
			return typeof value === "string" ? value : null;
		case "number":
			return typeof value === "number" ? value : null;
		default:
			return typeof value === "boolean" ? value : null;
	}
}

/**
 * Check a JSON body against `fields` and return the typed fields. Unknown
 * keys are dropped.
 */
export function validateBody<F extends Record<string, FieldSpec>>(
	body: unknown,
	fields: F,
): { body: ValidatedBody<F> } | { error: string } {
	if (!isRecord(body)) {
		return { error: "Request body must be a JSON object" };
	}
	const result: Record<string, string | number | boolean | undefined> = {};
	for (const key of Object.keys(fields)) {
		const spec = fields[key];
		if (spec === undefined) continue;
		const value = body[key];
		const read = readField(value, spec);
		if (read === null) {
			if (value === undefined || value === null) return { error: `Missing required field: "${key}"` };
			return { error: `Field "${key}" must be ${spec.replace("?", "")}, got ${typeof value}` };
		}
		result[key] = read;
	}
	// Every key of `fields` was checked against its spec above.
	return { body: result as ValidatedBody<F> };
}

export function validatePositiveIntegerAmount(amount: number | undefined): { error: string } | null {
	if (amount === undefined) return null;
	if (!Number.isFinite(amount) || amount <= 0 || !Number.isInteger(amount)) {
		return { error: "amount must be a positive integer (in smallest currency units)" };
	}
	return null;
}

// =============================================================================
// ENUM VALIDATION
// =============================================================================

export const VALID_ACCOUNT_STATUSES = new Set(["active", "canceled"] as const);
export const VALID_TRANSFER_STATUSES = new Set(["INITIATED", "PREPARED", "COMMITTED", "ABORTED"] as const);

export function validateEnum(
	value: string | undefined,
	validSet: ReadonlySet<string>,
	label: string,
): ApiResponse | null {
	if (value && !validSet.has(value)) {
		return badRequest(`Invalid ${label}: "${value}". Must be one of: ${[...validSet].join(", ")}`);
	}
	return null;
}

/** Narrow a query value to a member of `validSet`, or undefined. Call after `validateEnum`. */
export function enumValue<T extends string>(value: string | undefined, validSet: ReadonlySet<T>): T | undefined {
	for (const member of validSet) {
		if (member === value) return member;
	}
	return undefined;
}

export function pageParams(query: Record<string, string | undefined>): { page?: number; perPage?: number } {
	return {
		page: query.page ? Number(query.page) : undefined,
		perPage: query.perPage ? Number(query.perPage) : undefined,
	};
}

export function badRequest(message: string): ApiResponse {
	return errorResponse(400, "INVALID_ARGUMENT", message);
}
