/**
 * Unit tests for content cleaning, record creation and translation replacement
 */

import { describe, expect, it } from '@jest/globals';
import {
	cleanContent,
	isContentValid,
	normalizeText,
	stripHtmlWithRegex,
} from '~/features/content-preparation/clean.js';
import { createContentRecords, prepareRecords } from '~/features/content-preparation/records.js';
import { applyTranslations } from '~/features/content-preparation/translations.js';
import { createTestRecord } from '../helpers/mock-factories.js';

describe('cleanContent', () => {
	it('should strip markup, entities and punctuation', () => {
		expect(cleanContent('<p>Hello&nbsp;<b>world</b>!</p>')).toBe('Hello world');
	});

	it('should return an empty string for missing or blank content', () => {
		expect(cleanContent(null)).toBe('');
		expect(cleanContent(undefined)).toBe('');
		expect(cleanContent('')).toBe('');
		expect(cleanContent('   \n\t')).toBe('');
	});

	it('should drop script and style contents', () => {
		expect(cleanContent('<style>p { color: red; }</style><script>alert(1)</script>Visible')).toBe(
			'Visible'
		);
	});

	it('should separate words around line breaks', () => {
		expect(cleanContent('Line one<br>Line two')).toBe('Line one Line two');
	});

	it('should keep letters from non-Latin scripts', () => {
		expect(cleanContent('日本語のテキスト')).toBe('日本語のテキスト');
		expect(cleanContent('Café, déjà vu!')).toBe('Café déjà vu');
		expect(cleanContent('안녕하세요 세계')).toBe('안녕하세요 세계');
	});

	it('should keep digits and underscores', () => {
		expect(cleanContent('Level_2: 100%')).toBe('Level_2 100');
	});
});

describe('stripHtmlWithRegex', () => {
	it('should replace tags with spaces and decode common entities', () => {
		expect(stripHtmlWithRegex('<b>A</b>&amp;B&lt;C')).toBe(' A &B<C');
	});
});

describe('normalizeText', () => {
	it('should collapse whitespace and trim', () => {
		expect(normalizeText('  a\t\tb \n c ')).toBe('a b c');
	});

	it('should turn special characters into single spaces', () => {
		expect(normalizeText('one--two//three')).toBe('one two three');
	});
});

describe('isContentValid', () => {
	it('should enforce the default length bounds', () => {
		expect(isContentValid('ab')).toBe(false);
		expect(isContentValid('abc')).toBe(true);
		expect(isContentValid('a'.repeat(8000))).toBe(true);
		expect(isContentValid('a'.repeat(8001))).toBe(false);
	});

	it('should reject whitespace-only text', () => {
		expect(isContentValid('     ')).toBe(false);
	});

	it('should accept custom bounds', () => {
		const config = { minLength: 1, maxLength: 5 };
		expect(isContentValid('a', config)).toBe(true);
		expect(isContentValid('abcdef', config)).toBe(false);
	});
});

describe('createContentRecords', () => {
	it('should assign originalIndex from row order', () => {
		const records = createContentRecords([
			{ id: 'b', content: 'Second' },
			{ id: 'a', content: 'First', embedding: [1, 0] },
		]);

		expect(records).toEqual([
			{ id: 'b', rawText: 'Second', cleanText: '', originalIndex: 0 },
			{ id: 'a', rawText: 'First', cleanText: '', originalIndex: 1, embedding: [1, 0] },
		]);
	});
});

describe('prepareRecords', () => {
	it('should fill cleanText without touching the input records', () => {
		const input = createContentRecords([{ id: 'x', content: '<i>Hi there</i>' }]);

		const prepared = prepareRecords(input);

		expect(prepared[0].cleanText).toBe('Hi there');
		expect(input[0].cleanText).toBe('');
	});
});

describe('applyTranslations', () => {
	it('should replace text by id and drop derived fields', () => {
		const records = [
			createTestRecord({ id: 'a', originalIndex: 0, rawText: 'Bonjour', embedding: [1, 0] }),
			createTestRecord({ id: 'b', originalIndex: 1, rawText: 'Merci' }),
		];

		const translated = applyTranslations(records, [
			{ id: 'a', originalText: 'Bonjour', translatedText: 'Hello' },
		]);

		expect(translated).toEqual([
			{ id: 'a', rawText: 'Hello', cleanText: '', originalIndex: 0 },
			{ id: 'b', rawText: 'Merci', cleanText: 'Content 1', originalIndex: 1 },
		]);
		expect(translated[1]).not.toBe(records[1]);
	});

	it('should ignore translations for unknown ids', () => {
		const records = [createTestRecord({ id: 'a' })];

		expect(
			applyTranslations(records, [{ id: 'zzz', originalText: 'x', translatedText: 'y' }])
		).toEqual(records);
	});
});
