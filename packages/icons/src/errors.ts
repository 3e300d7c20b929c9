/**
 * Unify icon failures via Data.TaggedError for Effect.gen yield.
 * Enables catchTag discrimination, structured formatting, domain-scoped codes.
 */
import { Data } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type ErrorDomain = keyof typeof B;
type ErrorCode<D extends ErrorDomain> = D extends ErrorDomain ? keyof (typeof B)[D] : never;

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	Asset: {
		NO_ASSETS: { code: 'NO_ASSETS' as const, message: 'No SVG assets found' },
		READ_FAILED: { code: 'READ_FAILED' as const, message: 'Failed to read icon asset' },
	},
	Catalog: {
		DUPLICATE_ID: { code: 'DUPLICATE_ID' as const, message: 'Icon identifier is not unique' },
		EMPTY_CATALOG: { code: 'EMPTY_CATALOG' as const, message: 'Icon catalog is empty' },
		INVALID_CATALOG: { code: 'INVALID_CATALOG' as const, message: 'Icon catalog failed validation' },
		NOT_FOUND: { code: 'NOT_FOUND' as const, message: 'Icon not found' },
	},
	Markup: {
		ID_MISMATCH: { code: 'ID_MISMATCH' as const, message: 'Icon identifier does not match its source' },
		INVALID_ATTRIBUTE: { code: 'INVALID_ATTRIBUTE' as const, message: 'Invalid attribute value' },
		INVALID_ICON: { code: 'INVALID_ICON' as const, message: 'Icon definition failed validation' },
		MALFORMED: { code: 'MALFORMED' as const, message: 'Markup has no <svg> root' },
		MISSING_ID: { code: 'MISSING_ID' as const, message: 'Icon identifier is missing' },
		UNSUPPORTED_ELEMENT: { code: 'UNSUPPORTED_ELEMENT' as const, message: 'Unsupported SVG element' },
	},
	Render: {
		INVALID_SCOPE: { code: 'INVALID_SCOPE' as const, message: 'Render scope must contain only letters, digits, - or _' },
		INVALID_SIZE: { code: 'INVALID_SIZE' as const, message: 'Display size must be a positive integer' },
	},
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const messageOf = (domain: ErrorDomain, key: string): string => {
	const entries: Readonly<Record<string, { readonly message: string }>> = B[domain];
	return entries[key]?.message ?? key;
};

// --- [CLASSES] ---------------------------------------------------------------

class IconError<D extends ErrorDomain = ErrorDomain> extends Data.TaggedError('IconError')<{
	readonly code: ErrorCode<D>;
	readonly details?: unknown;
	readonly domain: D;
	readonly message: string;
}> {
	/** Format error for logging/display with domain:code prefix. */
	get formatted(): string { return `[${this.domain}:${String(this.code)}] ${this.message}`; }
	/** Construct from domain-scoped error code with optional message override and details. */
	static from<D extends ErrorDomain>(domain: D, key: ErrorCode<D>, message?: string, details?: unknown): IconError<D> {
		return new IconError<D>({ code: key, details, domain, message: message ?? messageOf(domain, String(key)) });
	}
	/** Append the offending icon id to a message. */
	static withIcon(msg: string, iconId: string): string { return `${msg} (${iconId})`; }
}

// --- [EXPORT] ----------------------------------------------------------------

export type { ErrorCode, ErrorDomain };
export { B as ICON_ERRORS, IconError };
