import { assertByteLength } from '../ids/identifier.js';

/** <https://firebase.google.com/docs/firestore/quotas#collections_documents_and_fields> */
export const MAX_NAME_BYTES = 6 * 1024;

/** Number of `/` segments in `projects/{p}/databases/{d}/documents`. */
export const ROOT_SEGMENT_COUNT = 5;

export function assertNameLength(value: string): void {
	assertByteLength(value, 1, MAX_NAME_BYTES);
}
