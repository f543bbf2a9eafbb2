import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { ParseError } from './errors.js';
import { RecordWriter, toCsv, toJson } from './output.js';
import { parseCsvRecords, parseJsonRecords, readRecordFile } from './record-reader.js';
import { URLEBIRD } from './sites.js';
import { makeRecord, videoUrl } from './__fixtures__/pages.js';

const truncated = makeRecord({
    descriptionAndHashtags: 'Long #dance...',
    hashtags: ['dance'],
    hashtagSource: 'description',
    needsEnrichment: true,
});
const quoted = makeRecord({
    url: videoUrl(2),
    videoId: '2',
    descriptionAndHashtags: 'Say "hi", #dance #fyp',
    hashtags: ['dance', 'fyp'],
    hashtagSource: 'description',
    tiktokUrl: 'https://www.tiktok.com/@someone/video/2',
});
const unknowns = makeRecord({
    url: videoUrl(3),
    videoId: null,
    estimatedReleaseTime: null,
    viewsRaw: 'n/a',
    views: null,
    author: '',
    tiktokUrl: null,
});
const records = [truncated, quoted, unknowns];

describe('parseCsvRecords', () => {
    it('reads back a stage-1 file', () => {
        const parsed = parseCsvRecords(toCsv(records, true), URLEBIRD);
        expect(parsed).toEqual(records.map((r) => ({ ...r, query: '' })));
    });

    it('recomputes the enrichment flag when the column is missing', () => {
        const [cut, whole] = parseCsvRecords(toCsv([
            makeRecord({ descriptionAndHashtags: 'Cut off here…' }),
            makeRecord({ url: videoUrl(2), descriptionAndHashtags: 'Complete' }),
        ]), URLEBIRD);
        expect(cut.needsEnrichment).toBe(true);
        expect(whole.needsEnrichment).toBe(false);
    });

    it('names the line of a bad row', () => {
        const lines = toCsv([truncated, quoted], true).split('\n');
        lines[2] = lines[2].replace(videoUrl(2), 'not a url');
        expect(() => parseCsvRecords(lines.join('\n'), URLEBIRD)).toThrow(ParseError);
        expect(() => parseCsvRecords(lines.join('\n'), URLEBIRD)).toThrow(/^csv: line 3 url: /);
    });
});

describe('parseJsonRecords', () => {
    it('reads back the json envelope with query and tiktok url', () => {
        const content = toJson(records, {
            site: 'urlebird',
            hashtags: ['dance'],
            crawled_at: '2023-06-10T12:00:00.000Z',
            crawl_config: {},
        });
        expect(parseJsonRecords(content, URLEBIRD)).toEqual(records);
    });

    it('rejects a file that is not the envelope', () => {
        expect(() => parseJsonRecords('{"records": []}', URLEBIRD)).toThrow(ParseError);
        expect(() => parseJsonRecords('[{"records": [', URLEBIRD)).toThrow('json: not a JSON file');
    });
});

describe('readRecordFile', () => {
    let dir: string | undefined;

    afterEach(() => {
        if (dir) fs.rmSync(dir, { recursive: true, force: true });
        dir = undefined;
    });

    it('picks the format from the extension', async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'urlebird-reader-'));
        const csvFile = path.join(dir, 'run.stage1.csv');
        const jsonFile = path.join(dir, 'run.stage1.json');
        const meta = { site: 'urlebird', hashtags: ['dance'], crawl_config: {} };
        await new RecordWriter('csv', meta).write(records, csvFile, true);
        await new RecordWriter('json', meta).write(records, jsonFile, true);

        expect(readRecordFile(csvFile, URLEBIRD).map((r) => r.needsEnrichment)).toEqual([true, false, false]);
        expect(readRecordFile(jsonFile, URLEBIRD)).toEqual(records);
    });
});
