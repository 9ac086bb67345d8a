/**
 * NFO Parser Tests
 */

import { jest } from '@jest/globals';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  getMediaKindFromRootTag,
  parseSidecarFile,
  parseSidecarXml,
} from '../../../src/services/nfo/nfoParser.js';
import { MalformedSidecarError } from '../../../src/errors/index.js';

jest.mock('../../../src/middleware/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const MOVIE_NFO = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<movie>
  <title>The Matrix</title>
  <year>1999</year>
  <uniqueid type="imdb" default="true">tt0133093</uniqueid>
  <genre>Action</genre>
  <genre>Science Fiction</genre>
  <plot></plot>
  <actor>
    <name>Keanu Reeves</name>
    <role>Neo</role>
  </actor>
  <actor>
    <name>Carrie-Anne Moss</name>
    <role>Trinity</role>
  </actor>
  <ratings>
    <rating name="imdb"><value>8.7</value></rating>
  </ratings>
</movie>`;

describe('getMediaKindFromRootTag', () => {
  it('should map documented synonyms', () => {
    expect(getMediaKindFromRootTag('movie')).toBe('movie');
    expect(getMediaKindFromRootTag('TVShow')).toBe('show');
    expect(getMediaKindFromRootTag('seasondetails')).toBe('season');
    expect(getMediaKindFromRootTag('episodedetails')).toBe('episode');
    expect(getMediaKindFromRootTag('musicvideo')).toBe('unknown');
  });
});

describe('parseSidecarXml', () => {
  it('should build scalar, list and record fields', async () => {
    const record = await parseSidecarXml(MOVIE_NFO, '/media/movies/The Matrix/movie.nfo');

    expect(record.rootTag).toBe('movie');
    expect(record.mediaKind).toBe('movie');
    expect(record.title).toBe('The Matrix');
    expect(record.fields.year).toEqual({ kind: 'scalar', value: '1999' });
    expect(record.fields.uniqueid).toEqual({ kind: 'scalar', value: 'tt0133093' });
    expect(record.fields.genre).toEqual({ kind: 'list', values: ['Action', 'Science Fiction'] });
    expect(record.fields.actor).toEqual({
      kind: 'records',
      records: [
        { name: 'Keanu Reeves', role: 'Neo' },
        { name: 'Carrie-Anne Moss', role: 'Trinity' },
      ],
    });
  });

  it('should treat empty elements as absent', async () => {
    const record = await parseSidecarXml(MOVIE_NFO, 'movie.nfo');
    expect(record.fields.plot).toBeUndefined();
  });

  it('should drop elements nested deeper than one level and list them', async () => {
    const record = await parseSidecarXml(MOVIE_NFO, 'movie.nfo');
    expect(record.fields.ratings).toBeUndefined();
    expect(record.droppedNestedFields).toEqual(['ratings.rating']);
  });

  it('should turn text entries into name records when a list is mixed', async () => {
    const xml = '<movie><title>Heat</title><genre>Drama</genre><genre><name>Crime</name></genre></movie>';
    const record = await parseSidecarXml(xml, 'movie.nfo');

    expect(record.fields.genre).toEqual({
      kind: 'records',
      records: [{ name: 'Drama' }, { name: 'Crime' }],
    });
  });

  it('should merge element names that differ only by case', async () => {
    const xml = '<movie><Title>First</Title><title>Second</title></movie>';
    const record = await parseSidecarXml(xml, 'movie.nfo');

    expect(record.fields.title).toEqual({ kind: 'list', values: ['First', 'Second'] });
    expect(record.title).toBe('First');
  });

  it('should read season and episode numbers', async () => {
    const xml = `<episodedetails>
      <title>Pilot</title>
      <season>1</season>
      <episode>2</episode>
    </episodedetails>`;
    const record = await parseSidecarXml(xml, 'S01E02.nfo');

    expect(record.mediaKind).toBe('episode');
    expect(record.seasonNumber).toBe(1);
    expect(record.episodeNumber).toBe(2);
  });

  it('should fall back to seasonnumber and ignore non-integer numbers', async () => {
    const xml = '<season><title>Season 3</title><seasonnumber>3</seasonnumber><episode>two</episode></season>';
    const record = await parseSidecarXml(xml, 'season.nfo');

    expect(record.seasonNumber).toBe(3);
    expect(record.episodeNumber).toBeNull();
  });

  it('should give an empty title when none is present', async () => {
    const record = await parseSidecarXml('<tvshow><year>2008</year></tvshow>', 'tvshow.nfo');
    expect(record.title).toBe('');
    expect(record.mediaKind).toBe('show');
  });

  it('should accept a leading byte order mark', async () => {
    const record = await parseSidecarXml('\uFEFF<movie><title>Alien</title></movie>', 'movie.nfo');
    expect(record.title).toBe('Alien');
  });

  it('should reject text that is not XML', async () => {
    await expect(parseSidecarXml('https://www.imdb.com/title/tt0133093/', 'movie.nfo')).rejects.toThrow(
      MalformedSidecarError
    );
  });

  it('should reject documents with DOCTYPE or entity declarations', async () => {
    const xml = '<!DOCTYPE movie [<!ENTITY xxe SYSTEM "file:///etc/passwd">]><movie><title>&xxe;</title></movie>';
    await expect(parseSidecarXml(xml, 'movie.nfo')).rejects.toThrow(MalformedSidecarError);
  });

  it('should reject malformed XML', async () => {
    await expect(parseSidecarXml('<movie><title>Broken</movie>', 'movie.nfo')).rejects.toThrow(
      MalformedSidecarError
    );
  });
});

describe('parseSidecarFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'nfo-parser-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should read and parse a file from disk', async () => {
    const nfoPath = path.join(tempDir, 'movie.nfo');
    await fs.writeFile(nfoPath, MOVIE_NFO, 'utf-8');

    const record = await parseSidecarFile(nfoPath);

    expect(record.path).toBe(nfoPath);
    expect(record.title).toBe('The Matrix');
  });

  it('should raise MalformedSidecarError for a missing file', async () => {
    const missing = path.join(tempDir, 'missing.nfo');

    await expect(parseSidecarFile(missing)).rejects.toMatchObject({
      name: 'MalformedSidecarError',
      path: missing,
    });
  });
});
