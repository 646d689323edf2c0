// tests/naming.test.ts

import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { defaultSingleOutputFile, outputFileName, planOutputFiles } from '../src/core/batch/naming.js';

describe('Output naming', () => {
    it('keeps PNG names and swaps JPEG extensions for .png', () => {
        expect(outputFileName('/shots/a.png')).toBe('a.png');
        expect(outputFileName('/shots/b.JPG')).toBe('b.png');
        expect(outputFileName('/shots/c.jpeg')).toBe('c.png');
        expect(outputFileName('/shots/d.PNG')).toBe('d.PNG');
    });

    it('places a single converted file next to its source', () => {
        expect(defaultSingleOutputFile('/shots/Screenshot_2024.jpg')).toBe(path.join('/shots', 'Screenshot_2024_ios.png'));
    });

    it('gives colliding names a numeric suffix in processing order', () => {
        const plan = planOutputFiles(['/in/a.png', '/in/a.jpg', '/in/sub/a.png', '/in/b.jpeg'], '/out');
        expect(plan.map((entry) => entry.outputFile)).toEqual([
            path.join('/out', 'a.png'),
            path.join('/out', 'a_1.png'),
            path.join('/out', 'a_2.png'),
            path.join('/out', 'b.png'),
        ]);
        expect(plan.map((entry) => entry.inputFile)).toEqual(['/in/a.png', '/in/a.jpg', '/in/sub/a.png', '/in/b.jpeg']);
    });

    it('treats names differing only in case as colliding', () => {
        const plan = planOutputFiles(['/in/Shot.png', '/in/shot.jpg'], '/out');
        expect(plan.map((entry) => path.basename(entry.outputFile))).toEqual(['Shot.png', 'shot_1.png']);
    });

    it('skips suffixes already taken by another source', () => {
        const plan = planOutputFiles(['/in/a.png', '/in/a_1.png', '/in/x/a.png'], '/out');
        expect(plan.map((entry) => path.basename(entry.outputFile))).toEqual(['a.png', 'a_1.png', 'a_2.png']);
    });
});
