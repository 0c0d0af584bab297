import { z } from 'zod';

import { PathError } from './errors.js';
import { CollectionId } from './ids/collection-id.js';
import { DatabaseId } from './ids/database-id.js';
import { DocumentId } from './ids/document-id.js';
import { ProjectId } from './ids/project-id.js';
import { CollectionName } from './name/collection-name.js';
import { DatabaseName } from './name/database-name.js';
import { DocumentName } from './name/document-name.js';
import { RootDocumentName } from './name/root-document-name.js';
import { CollectionPath } from './path/collection-path.js';
import { DocumentPath } from './path/document-path.js';

function pathSchema<T>(parse: (value: string) => T) {
	return z.string().transform((value, ctx): T => {
		try {
			return parse(value);
		} catch (error) {
			if (!(error instanceof PathError)) {
				throw error;
			}
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: error.message,
				params: { kind: error.kind }
			});
			return z.NEVER;
		}
	});
}

export const ProjectIdSchema = pathSchema((value) => ProjectId.parse(value));
export const DatabaseIdSchema = pathSchema((value) => DatabaseId.parse(value));
export const CollectionIdSchema = pathSchema((value) => CollectionId.parse(value));
export const DocumentIdSchema = pathSchema((value) => DocumentId.parse(value));
export const CollectionPathSchema = pathSchema((value) => CollectionPath.parse(value));
export const DocumentPathSchema = pathSchema((value) => DocumentPath.parse(value));
export const DatabaseNameSchema = pathSchema((value) => DatabaseName.parse(value));
export const RootDocumentNameSchema = pathSchema((value) => RootDocumentName.parse(value));
export const CollectionNameSchema = pathSchema((value) => CollectionName.parse(value));
export const DocumentNameSchema = pathSchema((value) => DocumentName.parse(value));
