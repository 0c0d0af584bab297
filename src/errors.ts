export type PathErrorKind =
	| 'lengthOutOfBounds'
	| 'containsInvalidCharacter'
	| 'containsSlash'
	| 'notContainsSlash'
	| 'startsWithNonLetter'
	| 'endsWithHyphen'
	| 'containsReservedWord'
	| 'matchesReservedIdPattern'
	| 'singlePeriodOrDoublePeriods'
	| 'invalidNumberOfPathComponents'
	| 'invalidName'
	| 'collectionIdConversion'
	| 'documentIdConversion'
	| 'collectionPathConversion'
	| 'documentPathConversion';

export type ConversionErrorKind = Extract<
	PathErrorKind,
	| 'collectionIdConversion'
	| 'documentIdConversion'
	| 'collectionPathConversion'
	| 'documentPathConversion'
>;

const MESSAGES: Record<Exclude<PathErrorKind, ConversionErrorKind>, string> = {
	lengthOutOfBounds: 'byte length out of bounds',
	containsInvalidCharacter: 'contains invalid character',
	containsSlash: 'contains slash',
	notContainsSlash: 'not contains slash',
	startsWithNonLetter: 'starts with non letter',
	endsWithHyphen: 'ends with hyphen',
	containsReservedWord: 'contains reserved word',
	matchesReservedIdPattern: 'matches the reserved id pattern __.*__',
	singlePeriodOrDoublePeriods: 'single period or double periods',
	invalidNumberOfPathComponents: 'invalid number of path components',
	invalidName: 'invalid name'
};

const CONVERSION_PREFIXES: Record<ConversionErrorKind, string> = {
	collectionIdConversion: 'collection id conversion',
	documentIdConversion: 'document id conversion',
	collectionPathConversion: 'collection path conversion',
	documentPathConversion: 'document path conversion'
};

function isConversionKind(kind: PathErrorKind): kind is ConversionErrorKind {
	return kind in CONVERSION_PREFIXES;
}

/**
 * Raised by every parser and constructor in this package. `kind` names the
 * single validation rule that failed.
 */
export class PathError extends Error {
	readonly kind: PathErrorKind;

	constructor(kind: Exclude<PathErrorKind, ConversionErrorKind>);
	constructor(kind: ConversionErrorKind, cause: PathError);
	constructor(kind: PathErrorKind, cause?: PathError) {
		if (isConversionKind(kind)) {
			const nested = cause ? cause.message : 'unknown error';
			super(`${CONVERSION_PREFIXES[kind]}: ${nested}`, { cause });
		} else {
			super(MESSAGES[kind]);
		}
		this.name = 'PathError';
		this.kind = kind;
	}
}

export function isPathError(value: unknown, kind?: PathErrorKind): value is PathError {
	if (!(value instanceof PathError)) {
		return false;
	}
	return kind === undefined || value.kind === kind;
}

/**
 * Runs `convert` and re-throws a `PathError` wrapped in the given conversion
 * kind, so the message names the argument that failed.
 */
export function wrapConversion<T>(kind: ConversionErrorKind, convert: () => T): T {
	try {
		return convert();
	} catch (error) {
		if (error instanceof PathError) {
			throw new PathError(kind, error);
		}
		throw error;
	}
}
