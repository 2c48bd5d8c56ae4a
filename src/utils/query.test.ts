import { describe, expect, it } from 'vitest';
import { composeQuery, looksLikeCql, looksLikeJql, maskLiterals, quote, textCql, textJql } from './query.js';

describe('query detection', () => {
	it('detects JQL', () => {
		expect(looksLikeJql('project = ABC AND status = "In Progress"')).toBe(true);
		expect(looksLikeJql('summary ~ "login"')).toBe(true);
		expect(looksLikeJql('payment failure')).toBe(false);
	});

	it('recognises JQL by its clauses', () => {
		expect(looksLikeJql('assignee is EMPTY')).toBe(true);
		expect(looksLikeJql('project in (ABC, DEF)')).toBe(true);
		expect(looksLikeJql('status was "Done"')).toBe(true);
		expect(looksLikeJql('ORDER BY created DESC')).toBe(true);
	});

	it('treats everyday sentences as text', () => {
		expect(looksLikeJql('login issue on mobile')).toBe(false);
		expect(looksLikeJql('project status updated after the created date')).toBe(false);
		expect(looksLikeJql('assignee labels for parent issue')).toBe(false);
		expect(looksLikeJql("what's new in the release")).toBe(false);
	});

	it('ignores operators inside quotes', () => {
		expect(looksLikeJql('"a = b"')).toBe(false);
		expect(looksLikeCql('"x > y"')).toBe(false);
	});

	it('detects CQL', () => {
		expect(looksLikeCql('title ~ "Meeting Notes"')).toBe(true);
		expect(looksLikeCql('lastModified > startOfMonth("-1M")')).toBe(true);
		expect(looksLikeCql('creator = currentUser()')).toBe(true);
		expect(looksLikeCql('onboarding checklist')).toBe(false);
	});
});

describe('text queries', () => {
	it('quotes and escapes values', () => {
		expect(quote('say "hi"')).toBe('"say \\"hi\\""');
		expect(quote('C:\\temp')).toBe('"C:\\\\temp"');
	});

	it('wraps plain text', () => {
		expect(textJql('login bug')).toBe('text ~ "login bug" ORDER BY updated DESC');
		expect(textCql('release notes')).toBe('text ~ "release notes"');
	});
});

describe('maskLiterals', () => {
	it('blanks quoted text and keeps offsets', () => {
		expect(maskLiterals('title ~ "a or b" OR x')).toBe('title ~ "      " OR x');
		expect(maskLiterals("space = 'DEV'")).toBe("space = '   '");
		expect(maskLiterals('t ~ "say \\"hi\\"" x')).toBe('t ~ "          " x');
	});
});

describe('composeQuery', () => {
	it('returns the trimmed query without filters', () => {
		expect(composeQuery('  type = page ', [])).toBe('type = page');
	});

	it('ANDs filters on', () => {
		expect(composeQuery('text ~ "x"', ['space = "DEV"', 'type = "page"'])).toBe(
			'text ~ "x" AND space = "DEV" AND type = "page"',
		);
	});

	it('parenthesises a query with OR', () => {
		expect(composeQuery('label = a OR label = b', ['space = "DEV"'])).toBe(
			'(label = a OR label = b) AND space = "DEV"',
		);
	});

	it('keeps ORDER BY last', () => {
		expect(composeQuery('type = page ORDER BY created DESC', ['space = "DEV"'])).toBe(
			'type = page AND space = "DEV" ORDER BY created DESC',
		);
	});

	it('leaves ORDER BY inside a quoted phrase alone', () => {
		expect(composeQuery('title ~ "sort order by date"', ['space = "ENG"'])).toBe(
			'title ~ "sort order by date" AND space = "ENG"',
		);
	});

	it('finds ORDER BY after a quoted phrase', () => {
		expect(composeQuery('title ~ "order by" ORDER BY created', ['type = "page"'])).toBe(
			'title ~ "order by" AND type = "page" ORDER BY created',
		);
	});

	it('does not parenthesise an OR inside quotes', () => {
		expect(composeQuery('text ~ "this or that"', ['space = "DEV"'])).toBe(
			'text ~ "this or that" AND space = "DEV"',
		);
	});
});
