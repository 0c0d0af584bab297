import { PathError } from '../errors.js';
import { DatabaseId } from '../ids/database-id.js';
import { Identifier } from '../ids/identifier.js';
import { ProjectId } from '../ids/project-id.js';
import type { CollectionPathLike } from '../path/collection-path.js';
import type { DocumentPathLike } from '../path/document-path.js';
import type { CollectionName } from './collection-name.js';
import type { DocumentName } from './document-name.js';
import { assertNameLength } from './limits.js';
import { RootDocumentName } from './root-document-name.js';

/**
 * format: `projects/{project_id}/databases/{database_id}`
 */
export class DatabaseName {
	readonly projectId: ProjectId;
	readonly databaseId: DatabaseId;

	constructor(projectId: ProjectId, databaseId: DatabaseId) {
		this.projectId = projectId;
		this.databaseId = databaseId;
		Object.freeze(this);
	}

	/** The `(default)` database of a project. */
	static fromProjectId(projectId: string | ProjectId): DatabaseName {
		return new DatabaseName(ProjectId.from(projectId), DatabaseId.default());
	}

	static parse(value: string): DatabaseName {
		assertNameLength(value);
		const parts = value.split('/');
		if (parts.length !== 4) {
			throw new PathError('invalidNumberOfPathComponents');
		}
		const [projects, projectId = '', databases, databaseId = ''] = parts;
		if (projects !== 'projects' || databases !== 'databases') {
			throw new PathError('invalidName');
		}
		return new DatabaseName(ProjectId.parse(projectId), DatabaseId.parse(databaseId));
	}

	static from(value: string | DatabaseName): DatabaseName {
		return value instanceof DatabaseName ? value : DatabaseName.parse(value);
	}

	/** Orders by database id, then by project id. */
	static compare(a: DatabaseName, b: DatabaseName): number {
		return (
			Identifier.compare(a.databaseId, b.databaseId) ||
			Identifier.compare(a.projectId, b.projectId)
		);
	}

	get rootDocumentName(): RootDocumentName {
		return new RootDocumentName(this);
	}

	collection(path: CollectionPathLike): CollectionName {
		return this.rootDocumentName.collection(path);
	}

	doc(path: DocumentPathLike): DocumentName {
		return this.rootDocumentName.doc(path);
	}

	isEqual(other: DatabaseName): boolean {
		return (
			other instanceof DatabaseName &&
			this.projectId.isEqual(other.projectId) &&
			this.databaseId.isEqual(other.databaseId)
		);
	}

	toString(): string {
		return `projects/${this.projectId.toString()}/databases/${this.databaseId.toString()}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
