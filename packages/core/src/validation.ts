/**
 * JSON Schema validation shared by the config loader, the readiness
 * parser and the log verifier.
 */

import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';

const ajv = new Ajv({ allErrors: true, strict: false });

export interface Validator<T> {
	/** Type guard; failures are available through `errors()` right after a false result */
	check(data: unknown): data is T;
	errors(): string[];
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
	return (errors ?? []).map((e) => {
		const path = e.instancePath || '/';
		return `${path}: ${e.message ?? 'invalid'}`;
	});
}

export function compileValidator<T>(schema: SchemaObject): Validator<T> {
	const validate: ValidateFunction<T> = ajv.compile<T>(schema);
	return {
		check: (data: unknown): data is T => validate(data),
		errors: () => formatAjvErrors(validate.errors),
	};
}
