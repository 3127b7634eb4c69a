import * as cheerio from 'cheerio';
import { env } from '~/shared/env.js';
import type { ContentValidationConfig } from '~/shared/types/config.js';

const WHITESPACE = /\s+/g;
// Letters (CJK and Hangul included), combining marks, digits, underscore and whitespace survive
const SPECIAL_CHARACTERS = /[^\p{L}\p{M}\p{N}\s_]/gu;

const HTML_ENTITIES: Record<string, string> = {
	'&nbsp;': ' ',
	'&amp;': '&',
	'&lt;': '<',
	'&gt;': '>',
	'&quot;': '"',
	'&#39;': "'",
	'&apos;': "'",
};

export const DEFAULT_VALIDATION: ContentValidationConfig = {
	minLength: env.MIN_CONTENT_LENGTH,
	maxLength: env.MAX_CONTENT_LENGTH,
};

function stripHtmlWithCheerio(html: string): string {
	const $ = cheerio.load(html);
	$('script, style, noscript').remove();
	$('br').replaceWith(' ');
	return $.root().text();
}

export function stripHtmlWithRegex(html: string): string {
	const withoutTags = html.replace(/<[^>]*>/g, ' ');
	return withoutTags.replace(/&(nbsp|amp|lt|gt|quot|#39|apos);/g, entity => HTML_ENTITIES[entity]);
}

export function normalizeText(text: string): string {
	const collapsed = text.replace(WHITESPACE, ' ').trim();
	return collapsed.replace(SPECIAL_CHARACTERS, ' ').replace(WHITESPACE, ' ').trim();
}

/**
 * Plain text suitable for embedding: markup removed, punctuation dropped,
 * whitespace collapsed.
 */
export function cleanContent(content: string | null | undefined): string {
	if (!content || content.trim().length === 0) {
		return '';
	}

	let text: string;
	try {
		text = stripHtmlWithCheerio(content);
		if (text.trim().length === 0) {
			text = stripHtmlWithRegex(content);
		}
	} catch {
		// Malformed markup the parser rejects still gets the tag-stripping pass
		text = stripHtmlWithRegex(content);
	}

	return normalizeText(text);
}

export function isContentValid(
	cleanText: string,
	config: ContentValidationConfig = DEFAULT_VALIDATION
): boolean {
	return (
		cleanText.trim().length > 0 &&
		cleanText.length >= config.minLength &&
		cleanText.length <= config.maxLength
	);
}
