import type { CollectionName } from '../name/collection-name.js';
import type { DatabaseName } from '../name/database-name.js';
import type { DocumentName } from '../name/document-name.js';
import type { RootDocumentName } from '../name/root-document-name.js';
import { DocumentNameSchema } from '../schemas.js';

export type ResourceName = DatabaseName | RootDocumentName | CollectionName | DocumentName;

export type CreateDocumentTarget = {
	parent: string;
	collectionId: string;
	documentId: string;
};

export type RunQueryTarget = {
	parent: string;
	collectionId: string;
};

function encodeResourceNameForUrl(resourceName: string): string {
	return resourceName
		.split('/')
		.map((segment) => encodeURIComponent(segment))
		.join('/');
}

/** `{baseUrl}/v1/{name}` with every segment URL-encoded. */
export function resourceUrl(baseUrl: string, name: ResourceName): string {
	const base = baseUrl.replace(/\/+$/g, '');
	return `${base}/v1/${encodeResourceNameForUrl(name.toString())}`;
}

function parentOf(collectionName: CollectionName): string {
	const parent = collectionName.parent;
	return parent ? parent.toString() : collectionName.rootDocumentName.toString();
}

/** Parent, collection id and document id of a `createDocument` call. */
export function createDocumentTarget(documentName: DocumentName): CreateDocumentTarget {
	return {
		parent: parentOf(documentName.parent),
		collectionId: documentName.collectionId.toString(),
		documentId: documentName.documentId.toString()
	};
}

/** Parent and collection id of a `runQuery` call over one collection. */
export function runQueryTarget(collectionName: CollectionName): RunQueryTarget {
	return {
		parent: parentOf(collectionName),
		collectionId: collectionName.collectionId.toString()
	};
}

/** Decodes the `name` field of a REST document. */
export function documentNameFromResource(resourceName: string): DocumentName {
	const parsed = DocumentNameSchema.safeParse(resourceName);
	if (parsed.success) {
		return parsed.data;
	}
	const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
	throw new Error(`Unexpected document name '${resourceName}': ${reason}`, { cause: parsed.error });
}
