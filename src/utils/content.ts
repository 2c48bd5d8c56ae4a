import { convert, type HtmlToTextOptions } from 'html-to-text';

const HEADINGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

const TEXT_OPTIONS: HtmlToTextOptions = {
	wordwrap: false,
	selectors: [
		{ selector: 'a', options: { ignoreHref: true } },
		{ selector: 'img', format: 'skip' },
		{ selector: 'table', format: 'dataTable', options: { uppercaseHeaderCells: false } },
		...HEADINGS.map(selector => ({ selector, options: { uppercase: false } })),
	],
};

/** Renders Confluence view/storage HTML as plain text, keeping paragraph breaks. */
export function htmlToPlainText(html: string): string {
	if (!html) return '';
	return convert(html, TEXT_OPTIONS).trim();
}

export function collapseWhitespace(s: string): string {
	return s.replace(/\s+/g, ' ').trim();
}

/**
 * Single-line excerpt of an HTML body. Longer text is cut back to the last word boundary
 * within `maxLength` and suffixed with `...`.
 */
export function extractExcerpt(html: string, maxLength = 200): string {
	const text = collapseWhitespace(htmlToPlainText(html));
	if (text.length <= maxLength) return text;
	const head = text.slice(0, maxLength);
	const cut = head.lastIndexOf(' ');
	return (cut === -1 ? head : head.slice(0, cut)) + '...';
}
