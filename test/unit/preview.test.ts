import { describe, it, expect } from 'vitest';
import { describeValue, renderDryRun, renderCounterpartDryRun } from '../../src/core/preview.js';

describe('Preview', () => {
    describe('describeValue', () => {
        it('should show only the length of strings', () => {
            expect(describeValue('s3cret')).toBe('<string, 6 chars>');
            expect(describeValue('')).toBe('<string, 0 chars>');
        });

        it('should show the kind of other values', () => {
            expect(describeValue(42)).toBe('<number>');
            expect(describeValue(false)).toBe('<boolean>');
            expect(describeValue(null)).toBe('<null>');
            expect(describeValue(['a'])).toBe('<array>');
        });
    });

    describe('renderDryRun', () => {
        it('should list keys in sorted order without values', () => {
            const lines = renderDryRun('secret', 'proj/app', { 'db.port': 5432, 'db.password': 'hunter22' });

            expect(lines).toEqual([
                '[dry-run] Would write to Vault path: secret/proj/app',
                '[dry-run] 2 secrets:',
                '  db.password = <string, 8 chars>',
                '  db.port = <number>',
            ]);
        });
    });

    describe('renderCounterpartDryRun', () => {
        it('should list the references that would be written', () => {
            expect(renderCounterpartDryRun('app.yaml', true, 'secret/proj', ['db.url'])).toEqual([
                '[dry-run] Would update app.yaml with vault references:',
                '  db.url: ref+vault://secret/proj/db.url#value',
            ]);
        });

        it('should note a missing counterpart', () => {
            expect(renderCounterpartDryRun('app.yaml', false, 'secret/proj', ['db.url'])).toEqual([
                '[dry-run] Counterpart file app.yaml does not exist, skipping',
            ]);
        });
    });
});
