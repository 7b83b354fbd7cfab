import { createHash } from 'node:crypto';
import { describe, it, expect, beforeEach } from 'vitest';
import { StageError } from '../../../src/domain/errors.js';
import {
  convertStage,
  createBookPipeline,
  ingestStage,
  packageStage,
  publishStage,
  validateStage,
  workArtifactKey,
  type StageContext,
  type StageInput,
} from '../../../src/pipeline/index.js';
import { publishedBookKey, publishedManifestKey } from '../../../src/pipeline/stages/publish.js';
import { InMemoryObjectStore } from '../../helpers/InMemoryObjectStore.js';

describe('book pipeline stages', () => {
  let store: InMemoryObjectStore;

  const params = {
    filename: '100227-01-river.md',
    contentType: 'text/markdown',
    productCode: '100227-01',
  };

  function input(artifactRef: string): StageInput {
    return { jobId: 'job-1', artifactRef, params };
  }

  function context(artifactKey: string): StageContext {
    return { objectStore: store, signal: new AbortController().signal, artifactKey };
  }

  beforeEach(() => {
    store = new InMemoryObjectStore();
  });

  it('runs the stages in a fixed order', () => {
    expect(createBookPipeline().map((stage) => stage.name)).toEqual([
      'ingest',
      'convert',
      'validate',
      'package',
      'publish',
    ]);
  });

  it('names work artifacts by position and stage', () => {
    expect(workArtifactKey('job-1', 0, ingestStage)).toBe('work/job-1/01-ingest.txt');
    expect(workArtifactKey('job-1', 3, packageStage)).toBe('work/job-1/04-package.json');
  });

  describe('ingest', () => {
    it('writes the decoded text with LF line endings', async () => {
      await store.put('inputs/job-1/a.md', Buffer.from('# T\r\nbody\r\n'), 'text/markdown');

      const result = await ingestStage.run(input('inputs/job-1/a.md'), context('work/job-1/01-ingest.txt'));

      expect(result.artifactRef).toBe('work/job-1/01-ingest.txt');
      expect(store.text('work/job-1/01-ingest.txt')).toBe('# T\nbody\n');
    });

    it('rejects bytes that are not UTF-8', async () => {
      await store.put('inputs/job-1/a.md', Buffer.from([0xff, 0xfe, 0x41]), 'text/plain');

      await expect(
        ingestStage.run(input('inputs/job-1/a.md'), context('work/job-1/01-ingest.txt'))
      ).rejects.toThrow('Input is not valid UTF-8');
      expect(store.objects.has('work/job-1/01-ingest.txt')).toBe(false);
    });

    it('stops before writing once aborted', async () => {
      await store.put('inputs/job-1/a.md', Buffer.from('# T\n'), 'text/markdown');
      const controller = new AbortController();
      controller.abort(new Error('timed out'));

      await expect(
        ingestStage.run(input('inputs/job-1/a.md'), {
          objectStore: store,
          signal: controller.signal,
          artifactKey: 'work/job-1/01-ingest.txt',
        })
      ).rejects.toThrow('timed out');
      expect(store.objects.has('work/job-1/01-ingest.txt')).toBe(false);
    });
  });

  it('convert cleans the markdown', async () => {
    await store.put('work/job-1/01-ingest.txt', Buffer.from('# T\n\n\n\n![](a.png)  '), 'text/plain');

    await convertStage.run(input('work/job-1/01-ingest.txt'), context('work/job-1/02-convert.md'));

    expect(store.text('work/job-1/02-convert.md')).toBe('# T\n\n![image](a.png)\n');
  });

  describe('validate', () => {
    it('passes the artifact through unchanged', async () => {
      await store.put('work/job-1/02-convert.md', Buffer.from('# T\n'), 'text/markdown');

      const result = await validateStage.run(
        input('work/job-1/02-convert.md'),
        context('work/job-1/03-validate.md')
      );

      expect(result.artifactRef).toBe('work/job-1/02-convert.md');
      expect(store.objects.has('work/job-1/03-validate.md')).toBe(false);
    });

    it('rejects an empty document', async () => {
      await store.put('work/job-1/02-convert.md', Buffer.from(''), 'text/markdown');

      const run = validateStage.run(input('work/job-1/02-convert.md'), context('unused'));

      await expect(run).rejects.toBeInstanceOf(StageError);
      await expect(run).rejects.toThrow('Document is empty after conversion');
    });

    it('rejects a document without a title line', async () => {
      await store.put('work/job-1/02-convert.md', Buffer.from('#\nBody\n'), 'text/markdown');

      await expect(
        validateStage.run(input('work/job-1/02-convert.md'), context('unused'))
      ).rejects.toThrow('Document has no title line');
    });
  });

  it('package bundles metadata with a checksum of the markdown', async () => {
    const markdown = '# The River\n\nText\n';
    await store.put('work/job-1/02-convert.md', Buffer.from(markdown), 'text/markdown');

    await packageStage.run(input('work/job-1/02-convert.md'), context('work/job-1/04-package.json'));

    const bundle: unknown = JSON.parse(store.text('work/job-1/04-package.json') ?? '');
    expect(bundle).toEqual({
      jobId: 'job-1',
      title: 'The River',
      productCode: '100227-01',
      filename: '100227-01-river.md',
      sourceContentType: 'text/markdown',
      sizeBytes: Buffer.byteLength(markdown),
      sha256: createHash('sha256').update(markdown).digest('hex'),
      markdown,
    });
  });

  describe('publish', () => {
    it('writes the book and manifest under the published area', async () => {
      const markdown = '# The River\n\nText\n';
      await store.put('work/job-1/02-convert.md', Buffer.from(markdown), 'text/markdown');
      await packageStage.run(input('work/job-1/02-convert.md'), context('work/job-1/04-package.json'));

      const result = await publishStage.run(
        input('work/job-1/04-package.json'),
        context('work/job-1/05-publish.md')
      );

      expect(result.artifactRef).toBe(publishedBookKey('job-1'));
      expect(store.text('published/job-1/book.md')).toBe(markdown);

      const manifest: unknown = JSON.parse(store.text(publishedManifestKey('job-1')) ?? '');
      expect(manifest).toMatchObject({
        jobId: 'job-1',
        title: 'The River',
        markdownKey: 'published/job-1/book.md',
      });
      expect(manifest).not.toHaveProperty('markdown');
    });

    it('fails on a package that does not match the schema', async () => {
      await store.put('work/job-1/04-package.json', Buffer.from('{"jobId":"job-1"}'), 'application/json');

      await expect(
        publishStage.run(input('work/job-1/04-package.json'), context('unused'))
      ).rejects.toThrow('Package artifact is unreadable (schema mismatch)');
    });

    it('fails on a package that is not JSON', async () => {
      await store.put('work/job-1/04-package.json', Buffer.from('not json'), 'application/json');

      await expect(
        publishStage.run(input('work/job-1/04-package.json'), context('unused'))
      ).rejects.toThrow('Package artifact is unreadable (invalid JSON)');
    });
  });
});
