export {
	PathError,
	isPathError,
	type ConversionErrorKind,
	type PathErrorKind
} from './errors.js';
export { CollectionId } from './ids/collection-id.js';
export { DatabaseId } from './ids/database-id.js';
export { DocumentId } from './ids/document-id.js';
export { Identifier } from './ids/identifier.js';
export { ProjectId } from './ids/project-id.js';
export { CollectionPath, type CollectionPathLike } from './path/collection-path.js';
export { DocumentPath, type DocumentPathLike } from './path/document-path.js';
export { CollectionName } from './name/collection-name.js';
export { DatabaseName } from './name/database-name.js';
export { DocumentName } from './name/document-name.js';
export { RootDocumentName } from './name/root-document-name.js';
export {
	CollectionIdSchema,
	CollectionNameSchema,
	CollectionPathSchema,
	DatabaseIdSchema,
	DatabaseNameSchema,
	DocumentIdSchema,
	DocumentNameSchema,
	DocumentPathSchema,
	ProjectIdSchema,
	RootDocumentNameSchema
} from './schemas.js';
export {
	createDocumentTarget,
	documentNameFromResource,
	resourceUrl,
	runQueryTarget,
	type CreateDocumentTarget,
	type ResourceName,
	type RunQueryTarget
} from './rest/resource.js';
export { resolveDatabaseName, type DatabaseNameOptions } from './config.js';
