import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { stringify as stringifyYaml } from 'yaml';

import { detectFormat, loadExtrinsicFile } from '../src/config/loader.js';
import {
  groupLabel,
  lookupBonus,
  sourceFlags,
} from '../src/core/lookup.js';
import { loadExtrinsicConfig } from '../src/core/parser.js';
import { serializeExtrinsicConfig } from '../src/core/serializer.js';
import { toExtrinsicDocument } from '../src/core/document.js';
import { ConfigError } from '../src/core/errors.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/pipeline.cfg', import.meta.url));
const OPTIONS = { extraSources: ['RM'] };

describe('detectFormat', () => {
  it('should pick the reader from the file extension', () => {
    expect(detectFormat('weights.json')).toBe('json');
    expect(detectFormat('weights.YAML')).toBe('yaml');
    expect(detectFormat('weights.yml')).toBe('yaml');
    expect(detectFormat('extrinsic.cfg')).toBe('cfg');
    expect(detectFormat('extrinsic')).toBe('cfg');
  });
});

describe('loadExtrinsicFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'hintcfg-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load the pipeline fixture', async () => {
    const config = await loadExtrinsicFile(FIXTURE, OPTIONS);

    expect(config.sources).toEqual(['M', 'RM', 'E', 'W', 'T']);
    expect(groupLabel(config)).toBe('Comparative Annotation Run');
    expect([...sourceFlags(config, 'T')]).toEqual(['individual_liability']);
    expect(lookupBonus(config, 'intron', 'E')).toEqual({ malus: 1, bonus: 1e6 });
    expect(lookupBonus(config, 'nonexonpart', 'RM')).toEqual({ malus: 1, bonus: 1.2 });
    expect(lookupBonus(config, 'exonpart', 'W')).toEqual({ malus: 1, bonus: 1.01 });
    expect(lookupBonus(config, 'CDSpart', 'T', 30)).toEqual({
      malus: 2,
      bonus: 1e15,
      curve: { minFragmentLength: 25, fullBonus: 1e15 },
    });
  });

  it('should reject the fixture when its pipeline source is not registered', async () => {
    await expect(loadExtrinsicFile(FIXTURE)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadExtrinsicFile(FIXTURE)).rejects.toMatchObject({
      kind: 'UnknownSource',
      line: 6,
      token: 'RM',
    });
  });

  it('should round-trip the fixture through the text form', async () => {
    const config = await loadExtrinsicFile(FIXTURE, OPTIONS);
    const target = path.join(dir, 'normalized.cfg');
    await writeFile(target, serializeExtrinsicConfig(config), 'utf-8');

    expect(await loadExtrinsicFile(target, OPTIONS)).toEqual(config);
  });

  it('should load the JSON form', async () => {
    const config = await loadExtrinsicFile(FIXTURE, OPTIONS);
    const target = path.join(dir, 'weights.json');
    await writeFile(target, JSON.stringify(toExtrinsicDocument(config)), 'utf-8');

    expect(await loadExtrinsicFile(target, OPTIONS)).toEqual(config);
  });

  it('should load the YAML form', async () => {
    const config = await loadExtrinsicFile(FIXTURE, OPTIONS);
    const target = path.join(dir, 'weights.yaml');
    await writeFile(target, stringifyYaml(toExtrinsicDocument(config)), 'utf-8');

    expect(await loadExtrinsicFile(target, OPTIONS)).toEqual(config);
  });

  it('should report unreadable JSON as a schema violation', async () => {
    const target = path.join(dir, 'broken.json');
    await writeFile(target, '{ "sources": [', 'utf-8');

    await expect(loadExtrinsicFile(target)).rejects.toMatchObject({ kind: 'SchemaViolation' });
  });

  it('should propagate file system errors', async () => {
    await expect(loadExtrinsicFile(path.join(dir, 'missing.cfg'))).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });

  it('should agree with the in-memory loader', async () => {
    const text = await readFile(FIXTURE, 'utf-8');
    expect(await loadExtrinsicFile(FIXTURE, OPTIONS)).toEqual(loadExtrinsicConfig(text, OPTIONS));
  });
});
