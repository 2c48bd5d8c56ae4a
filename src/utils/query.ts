// JQL / CQL helpers shared by the clients and the tool server.

/**
 * Blanks out the contents of quoted literals (`"..."` and `'...'`, honouring backslash escapes)
 * so keyword searches only see query structure. Offsets are preserved.
 */
export function maskLiterals(q: string): string {
	let out = '';
	let open = '';
	for (let i = 0; i < q.length; i++) {
		const ch = q[i];
		if (!open) {
			if (ch === '"' || ch === "'") open = ch;
			out += ch;
		} else if (ch === '\\' && i + 1 < q.length) {
			out += '  ';
			i++;
		} else if (ch === open) {
			open = '';
			out += ch;
		} else {
			out += ' ';
		}
	}
	return out;
}

const CLAUSE_OPERATOR =
	/!=|>=|<=|[=~<>]|\b(?:not\s+)?in\s*\(|\bis\s+(?:not\s+)?(?:empty|null)\b|\bwas\s+(?:not\s+)?(?:in\s*\(|")/i;
const TRAILING_ORDER_BY = /\border\s+by\s+[\w."]+(?:\s+(?:asc|desc))?(?:\s*,\s*[\w."]+(?:\s+(?:asc|desc))?)*\s*$/i;
const CQL_FUNCTION = /\b(?:siteSearch|currentUser|startOf\w+|endOf\w+|now)\s*\(/i;

export function looksLikeJql(q: string): boolean {
	const s = maskLiterals(q.trim());
	return CLAUSE_OPERATOR.test(s) || TRAILING_ORDER_BY.test(s);
}

export function looksLikeCql(q: string): boolean {
	const s = maskLiterals(q.trim());
	return CLAUSE_OPERATOR.test(s) || TRAILING_ORDER_BY.test(s) || CQL_FUNCTION.test(s);
}

/** Double-quoted JQL/CQL string literal. */
export function quote(value: string): string {
	return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function textJql(query: string): string {
	return `text ~ ${quote(query)} ORDER BY updated DESC`;
}

export function textCql(query: string): string {
	return `text ~ ${quote(query)}`;
}

/**
 * ANDs `filters` onto a CQL/JQL query. A query containing an OR is parenthesised so the
 * filters apply to every branch, and a trailing ORDER BY stays last. Keywords inside quoted
 * literals are ignored.
 */
export function composeQuery(query: string, filters: string[]): string {
	const trimmed = query.trim();
	if (!filters.length) return trimmed;
	const masked = maskLiterals(trimmed);
	const m = /\s+order\s+by\s+\S/i.exec(masked);
	let base = m ? trimmed.slice(0, m.index) : trimmed;
	const orderBy = m ? trimmed.slice(m.index) : '';
	if (/\bor\b/i.test(masked.slice(0, base.length))) base = `(${base})`;
	return [base, ...filters].filter(Boolean).join(' AND ') + orderBy;
}
