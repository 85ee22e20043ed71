import { z } from "zod";
import { ValidationError } from "@coordinator-probe/core";

export const KUBESCR_CLIENT_ID = "kubescr";
export const ACTION_ADD_DEPENDENCIES = "add_dependencies";

export const HookActionSchema = z.enum([
	"pre-dump",
	"post-dump",
	"pre-restore",
	"post-restore",
	"network-lock",
	"network-unlock",
	"pre-stream",
	"post-stream",
]);
export type HookAction = z.output<typeof HookActionSchema>;

export const CoordinatorActionSchema = z.union([HookActionSchema, z.literal(ACTION_ADD_DEPENDENCIES)]);
export type CoordinatorAction = z.output<typeof CoordinatorActionSchema>;

// Names are sent verbatim, so " c1" and "c1" stay distinct components.
const ComponentNameSchema = z.string().refine((name) => name.trim().length > 0, "Component names must not be empty");

// The coordinator ignores a component listed among its own dependencies.
export const DependenciesMapSchema = z
	.record(ComponentNameSchema, z.array(ComponentNameSchema))
	.transform((map) =>
		Object.fromEntries(
			Object.entries(map).map(([component, dependencies]) => [
				component,
				dependencies.filter((dependency) => dependency !== component),
			]),
		),
	);

/**
 * Component name to the ordered component names it is linked with.
 * Edge direction is left to the coordinator.
 */
export type DependenciesMap = Record<string, string[]>;

export const RequestEnvelopeSchema = z.object({
	id: z.string().min(1),
	action: CoordinatorActionSchema,
	dependencies: z.union([DependenciesMapSchema, z.string()]),
});

/**
 * One command sent as the entire body of a coordinator connection.
 * `dependencies` is a map for add_dependencies and a colon-separated
 * list for the hook actions.
 */
export interface RequestEnvelope {
	id: string;
	action: CoordinatorAction;
	dependencies: DependenciesMap | string;
}

/** The coordinator reads a dependencies map only from the kubescr client. */
export interface AddDependenciesEnvelope extends RequestEnvelope {
	id: typeof KUBESCR_CLIENT_ID;
	action: typeof ACTION_ADD_DEPENDENCIES;
	dependencies: DependenciesMap;
}

export interface HookEnvelope extends RequestEnvelope {
	action: HookAction;
	dependencies: string;
}

const describeIssues = (error: z.ZodError): string =>
	error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");

/**
 * Validates untrusted input, such as a parsed dependencies file, and drops
 * self-edges.
 */
export const parseDependenciesMap = (value: unknown): DependenciesMap => {
	const parsed = DependenciesMapSchema.safeParse(value);
	if (!parsed.success) {
		throw new ValidationError(`Invalid dependencies map: ${describeIssues(parsed.error)}`, "dependencies");
	}
	return parsed.data;
};

/**
 * Links every component with every other one, keeping input order.
 */
export const meshDependencies = (components: readonly string[]): DependenciesMap => {
	const unique = [...new Set(components.map((component) => component.trim()))];
	if (unique.some((component) => component.length === 0)) {
		throw new ValidationError("Component names must not be empty", "components");
	}
	if (unique.length < 2) {
		throw new ValidationError("At least two distinct components are needed to form a dependency", "components");
	}
	return Object.fromEntries(
		unique.map((component) => [component, unique.filter((other) => other !== component)]),
	);
};

export const buildAddDependenciesEnvelope = (dependencies: DependenciesMap): AddDependenciesEnvelope => ({
	id: KUBESCR_CLIENT_ID,
	action: ACTION_ADD_DEPENDENCIES,
	dependencies: parseDependenciesMap(dependencies),
});

export const buildHookEnvelope = (
	id: string,
	action: HookAction,
	dependencies: readonly string[] = [],
): HookEnvelope => {
	if (id.trim().length === 0) {
		throw new ValidationError("Client ID must not be empty", "id");
	}
	const names = dependencies.map((dependency) => dependency.trim()).filter((dependency) => dependency.length > 0);
	if (names.some((name) => name.includes(":"))) {
		throw new ValidationError("Dependency IDs must not contain ':'", "dependencies");
	}
	return { id, action, dependencies: names.join(":") };
};

export const serializeEnvelope = (envelope: RequestEnvelope): Buffer => {
	const parsed = RequestEnvelopeSchema.safeParse(envelope);
	if (!parsed.success) {
		throw new ValidationError(`Invalid request envelope: ${describeIssues(parsed.error)}`);
	}
	return Buffer.from(JSON.stringify(envelope), "utf8");
};

export const SMOKE_COMPONENTS = ["c1", "c2", "c3"] as const;

export const SMOKE_ENVELOPE: AddDependenciesEnvelope = buildAddDependenciesEnvelope(
	meshDependencies(SMOKE_COMPONENTS),
);
