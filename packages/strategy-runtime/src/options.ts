import { z } from "zod";
import { InvalidParametersError } from "@tickforge/core";
import type {
	OptionSpec,
	OptionValue,
	StrategyDefinition,
	StrategyParams,
} from "./types";

type OptionSchema = z.ZodType<OptionValue, z.ZodTypeDef, unknown>;

const withChoices = <T extends string | number>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	option: OptionSpec
): z.ZodType<T, z.ZodTypeDef, unknown> => {
	const choices = option.constraints?.choices;
	if (!choices?.length) {
		return schema;
	}
	return schema.refine((value) => choices.includes(value), {
		message: `must be one of ${choices.join(", ")}`,
	});
};

const numericSchema = (option: OptionSpec, defaultValue: number): OptionSchema => {
	let schema = z.number({
		invalid_type_error: `expected ${option.type === "integer" ? "an integer" : "a number"}`,
	});
	schema = schema.finite();
	if (option.type === "integer") {
		schema = schema.int();
	}
	const { min, max, greaterThan } = option.constraints ?? {};
	if (min !== undefined) {
		schema = schema.min(min);
	}
	if (max !== undefined) {
		schema = schema.max(max);
	}
	if (greaterThan !== undefined) {
		schema = schema.gt(greaterThan);
	}
	return withChoices(schema, option).default(defaultValue);
};

export const schemaForOption = (option: OptionSpec): OptionSchema => {
	const mismatch = new Error(
		`Option ${option.name} default does not match its type ${option.type}`
	);
	switch (option.type) {
		case "integer":
		case "number":
			if (typeof option.default !== "number") {
				throw mismatch;
			}
			return numericSchema(option, option.default);
		case "boolean":
			if (typeof option.default !== "boolean") {
				throw mismatch;
			}
			return z.boolean().default(option.default);
		case "string":
			if (typeof option.default !== "string") {
				throw mismatch;
			}
			return withChoices(z.string(), option).default(option.default);
	}
};

/**
 * Strict object schema for a strategy's declared options: unknown keys are
 * rejected and omitted keys take their defaults.
 */
export const buildParameterSchema = (definition: StrategyDefinition) => {
	const shape: Record<string, OptionSchema> = {};
	for (const option of definition.options) {
		shape[option.name] = schemaForOption(option);
	}
	return z
		.object(shape)
		.strict()
		.superRefine((params, ctx) => {
			for (const issue of definition.refine?.(params) ?? []) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: issue.message,
					path: issue.path ? issue.path.split(".") : [],
				});
			}
		});
};

export const validateParameters = (
	definition: StrategyDefinition,
	raw: unknown = {}
): StrategyParams => {
	const result = buildParameterSchema(definition).safeParse(raw ?? {});
	if (!result.success) {
		throw new InvalidParametersError(
			definition.id,
			result.error.issues.map((issue) => ({
				path: issue.path.join("."),
				message: issue.message,
			}))
		);
	}
	return Object.freeze({ ...result.data });
};

export const defaultParameters = (
	definition: StrategyDefinition
): StrategyParams =>
	Object.freeze(
		Object.fromEntries(
			definition.options.map(
				(option): [string, OptionValue] => [option.name, option.default]
			)
		)
	);

/** Reads a validated numeric option; throws if the option is missing. */
export const numberParam = (params: StrategyParams, name: string): number => {
	const value = params[name];
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`Required numeric parameter missing: ${name}`);
	}
	return value;
};
