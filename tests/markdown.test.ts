import { describe, it, expect } from 'vitest';
import {
    HeadingTracker,
    LIST_ITEM_RULE,
    findFencedCodeBlocks,
    findHeadings,
    findProtectedRanges,
    mergeRanges,
} from '../src/chunking/markdown.js';
import { nextBoundaries } from '../src/chunking/separators.js';

describe('findFencedCodeBlocks', () => {
    it('finds a closed backtick fence', () => {
        expect(findFencedCodeBlocks('text\n```js\ncode\n```\nafter')).toEqual([{ start: 5, end: 19 }]);
    });

    it('runs an unclosed fence to the end of the text', () => {
        expect(findFencedCodeBlocks('```\ncode')).toEqual([{ start: 0, end: 8 }]);
    });

    it('closes a tilde fence with a longer tilde run', () => {
        expect(findFencedCodeBlocks('~~~\nx\n~~~~')).toEqual([{ start: 0, end: 10 }]);
    });

    it('does not close a backtick fence with tildes', () => {
        expect(findFencedCodeBlocks('```\nx\n~~~\ny')).toEqual([{ start: 0, end: 11 }]);
    });

    it('ignores backtick info strings containing backticks', () => {
        expect(findFencedCodeBlocks('```a`b\ntext')).toEqual([]);
    });
});

describe('findHeadings', () => {
    it('finds ATX headings outside code fences', () => {
        const text = '# Title\ntext\n## Sub\n```\n# not\n```';
        const fences = findFencedCodeBlocks(text);

        expect(fences).toEqual([{ start: 20, end: 33 }]);
        expect(findHeadings(text, fences)).toEqual([
            { start: 0, level: 1, title: 'Title' },
            { start: 13, level: 2, title: 'Sub' },
        ]);
    });

    it('requires a space after the hashes and strips closing hashes', () => {
        expect(findHeadings('#hashtag\n### Setup ###', [])).toEqual([{ start: 9, level: 3, title: 'Setup' }]);
    });

    it('keeps hashes that end a heading title without a space before them', () => {
        expect(findHeadings('# C#\n## Notes ##', [])).toEqual([
            { start: 0, level: 1, title: 'C#' },
            { start: 5, level: 2, title: 'Notes' },
        ]);
    });

    it('adds heading annotations from an upstream parser', () => {
        const text = 'Overview\nbody';
        expect(findHeadings(text, [], [{ start: 0, end: 8, kind: 'heading' }])).toEqual([
            { start: 0, level: 1, title: 'Overview' },
        ]);
    });
});

describe('HeadingTracker', () => {
    const tracker = new HeadingTracker([
        { start: 0, level: 1, title: 'A' },
        { start: 10, level: 2, title: 'B' },
        { start: 20, level: 2, title: 'C' },
        { start: 30, level: 1, title: 'D' },
    ]);

    it('reports the active heading at each level', () => {
        expect(tracker.pathAt(5)).toEqual(['A']);
        expect(tracker.pathAt(15)).toEqual(['A', 'B']);
        expect(tracker.pathAt(20)).toEqual(['A', 'C']);
    });

    it('clears deeper levels when a shallower heading starts', () => {
        expect(tracker.pathAt(35)).toEqual(['D']);
    });

    it('is empty before the first heading', () => {
        expect(new HeadingTracker([{ start: 4, level: 1, title: 'X' }]).pathAt(0)).toEqual([]);
    });
});

describe('findProtectedRanges', () => {
    it('protects links and images', () => {
        expect(findProtectedRanges('See [docs](http://x.y) now', [])).toEqual([{ start: 4, end: 22 }]);
        expect(findProtectedRanges('![alt](a.png)', [])).toEqual([{ start: 0, end: 13 }]);
    });

    it('protects each table row', () => {
        expect(findProtectedRanges('| a | b |\n| 1 | 2 |', [])).toEqual([
            { start: 0, end: 9 },
            { start: 10, end: 19 },
        ]);
    });

    it('protects display math', () => {
        expect(findProtectedRanges('x $$a + b$$ y', [])).toEqual([{ start: 2, end: 11 }]);
    });

    it('merges fences with code and table annotations', () => {
        const ranges = findProtectedRanges('0123456789abcdef', [{ start: 0, end: 4 }], [
            { start: 3, end: 8, kind: 'code' },
            { start: 10, end: 12, kind: 'table' },
            { start: 13, end: 15, kind: 'paragraph' },
        ]);
        expect(ranges).toEqual([
            { start: 0, end: 8 },
            { start: 10, end: 12 },
        ]);
    });
});

describe('mergeRanges', () => {
    it('sorts, drops empty ranges and merges overlaps', () => {
        expect(
            mergeRanges([
                { start: 5, end: 10 },
                { start: 0, end: 3 },
                { start: 8, end: 12 },
                { start: 12, end: 12 },
            ])
        ).toEqual([
            { start: 0, end: 3 },
            { start: 5, end: 12 },
        ]);
    });
});

describe('LIST_ITEM_RULE', () => {
    it('cuts before each list marker', () => {
        const text = 'Items:\n- one\n- two\n3. three';
        expect(nextBoundaries(text, LIST_ITEM_RULE, 0, text.length)).toEqual([7, 13, 19]);
    });
});
