import { z } from 'zod';

import { DatabaseId } from './ids/database-id.js';
import { ProjectId } from './ids/project-id.js';
import { DatabaseName } from './name/database-name.js';

export type DatabaseNameOptions = {
	projectId?: string | ProjectId;
	databaseId?: string | DatabaseId;
};

const PROJECT_ID_ENV_NAMES = ['GOOGLE_CLOUD_PROJECT', 'GCLOUD_PROJECT'] as const;
const DATABASE_ID_ENV_NAME = 'FIRESTORE_DATABASE_ID';

const EnvStringSchema = z.string().trim().min(1);

const ProcessEnvSchema = z.object({
	process: z.object({ env: z.record(z.string(), z.string().optional()) }).optional()
});

function readEnvString(name: string): string | null {
	const globalValue = EnvStringSchema.safeParse(Reflect.get(globalThis, name));
	if (globalValue.success) {
		return globalValue.data;
	}

	const host = ProcessEnvSchema.safeParse(globalThis);
	const processValue = EnvStringSchema.safeParse(
		host.success ? host.data.process?.env[name] : undefined
	);
	if (processValue.success) {
		return processValue.data;
	}

	return null;
}

function resolveProjectId(projectId: string | ProjectId | undefined): ProjectId {
	if (projectId !== undefined) {
		return ProjectId.from(projectId);
	}
	for (const name of PROJECT_ID_ENV_NAMES) {
		const value = readEnvString(name);
		if (value) {
			return ProjectId.parse(value);
		}
	}
	throw new Error(
		`Missing project id. Provide 'projectId' or set ${PROJECT_ID_ENV_NAMES.join(' or ')}.`
	);
}

/**
 * Builds the database name from explicit options, falling back to
 * GOOGLE_CLOUD_PROJECT / GCLOUD_PROJECT and FIRESTORE_DATABASE_ID. Values are
 * looked up on `globalThis` first (Workers-style secret bindings), then on
 * `process.env`.
 */
export function resolveDatabaseName(options: DatabaseNameOptions = {}): DatabaseName {
	const projectId = resolveProjectId(options.projectId);
	if (options.databaseId !== undefined) {
		return new DatabaseName(projectId, DatabaseId.from(options.databaseId));
	}
	const databaseId = readEnvString(DATABASE_ID_ENV_NAME);
	return new DatabaseName(
		projectId,
		databaseId ? DatabaseId.parse(databaseId) : DatabaseId.default()
	);
}
