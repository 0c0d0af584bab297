import { PathError } from '../src/errors.js';

export const ROOT = 'projects/my-project/databases/my-database/documents';

export function catchPathError(fn: () => unknown): PathError {
	try {
		fn();
	} catch (error) {
		if (error instanceof PathError) {
			return error;
		}
		throw error;
	}
	throw new Error('Expected a PathError to be thrown.');
}
