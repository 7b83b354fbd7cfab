import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

import {
  BadRequestError,
  ConflictError,
  JobFailedError,
  JobNotEligibleError,
  NotFoundError,
  NotReadyError,
  UnavailableError,
} from '../../../src/domain/errors.js';
import { JobService, sanitizeFilename } from '../../../src/services/JobService.js';
import { InMemoryJobRepository } from '../../helpers/InMemoryJobRepository.js';
import { InMemoryObjectStore } from '../../helpers/InMemoryObjectStore.js';

const MAX_UPLOAD_BYTES = 1024;

describe('JobService', () => {
  let jobRepo: InMemoryJobRepository;
  let objectStore: InMemoryObjectStore;
  let service: JobService;

  beforeEach(() => {
    vi.clearAllMocks();
    jobRepo = new InMemoryJobRepository();
    objectStore = new InMemoryObjectStore();
    service = new JobService(jobRepo, objectStore, MAX_UPLOAD_BYTES);
  });

  async function submit(text = '# Title\n\nBody\n') {
    return service.submit({
      body: Buffer.from(text),
      contentType: 'text/markdown; charset=utf-8',
      filename: '100227-01 The River.md',
    });
  }

  describe('submit', () => {
    it('stores the input and creates a queued job', async () => {
      const job = await submit();

      expect(job.status).toBe('queued');
      expect(job.filename).toBe('100227-01_The_River.md');
      expect(job.productCode).toBe('100227-01');
      expect(job.inputRef).toBe(`inputs/${job.id}/100227-01_The_River.md`);
      expect(job.sizeBytes).toBe(14);
      expect(objectStore.text(job.inputRef)).toBe('# Title\n\nBody\n');
      await expect(jobRepo.get(job.id)).resolves.toEqual(job);
    });

    it('rejects unsupported content types before writing', async () => {
      await expect(
        service.submit({ body: Buffer.from('%PDF'), contentType: 'application/pdf' })
      ).rejects.toBeInstanceOf(BadRequestError);
      expect(objectStore.writes).toBe(0);
      expect(jobRepo.size).toBe(0);
    });

    it('rejects empty and oversized bodies', async () => {
      await expect(
        service.submit({ body: Buffer.alloc(0), contentType: 'text/plain' })
      ).rejects.toThrow('Request body is empty');
      await expect(
        service.submit({ body: Buffer.alloc(MAX_UPLOAD_BYTES + 1, 0x61), contentType: 'text/plain' })
      ).rejects.toThrow('Request body exceeds the upload limit');
      expect(objectStore.writes).toBe(0);
    });

    it('removes the stored input when the job record cannot be created', async () => {
      jobRepo.setAvailable(false);

      await expect(submit()).rejects.toBeInstanceOf(UnavailableError);

      expect(objectStore.writes).toBe(1);
      expect(objectStore.objects.size).toBe(0);
      expect(objectStore.deleted).toHaveLength(1);
      expect(objectStore.deleted[0]).toMatch(/^inputs\/[0-9a-f-]{36}\/100227-01_The_River\.md$/);
    });

    it('keeps the create error when the input cannot be removed either', async () => {
      vi.spyOn(jobRepo, 'create').mockImplementation(async () => {
        objectStore.setAvailable(false);
        throw new UnavailableError('state-store', 'State store connection severed');
      });

      await expect(submit()).rejects.toThrow('State store connection severed');
      expect(loggerMock.logger.warn).toHaveBeenCalledWith(
        'Failed to delete input of unrecorded job',
        expect.objectContaining({ error: 'Object store unreachable' })
      );
    });
  });

  describe('submitFromUrl', () => {
    const SOURCE_URL = 'https://books.example.test/library/100227-01-river.md';
    const fetchMock = vi.fn<typeof fetch>();

    beforeEach(() => {
      fetchMock.mockReset();
      vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('downloads the document and submits it under the URL filename', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('# Title\n\nBody\n', {
          headers: { 'content-type': 'application/octet-stream' },
        })
      );

      const job = await service.submitFromUrl({ sourceUrl: SOURCE_URL });

      expect(String(fetchMock.mock.calls[0][0])).toBe(SOURCE_URL);
      expect(job.filename).toBe('100227-01-river.md');
      expect(job.productCode).toBe('100227-01');
      expect(job.contentType).toBe('text/markdown');
      expect(job.sizeBytes).toBe(14);
      expect(job.inputRef).toBe(`inputs/${job.id}/100227-01-river.md`);
      expect(objectStore.text(job.inputRef)).toBe('# Title\n\nBody\n');
      expect((await jobRepo.get(job.id)).status).toBe('queued');
    });

    it('prefers an explicit filename and the served content type', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('plain words', { headers: { 'content-type': 'text/plain; charset=utf-8' } })
      );

      const job = await service.submitFromUrl({
        sourceUrl: 'https://books.example.test/download?id=7',
        filename: 'river notes.txt',
      });

      expect(job.filename).toBe('river_notes.txt');
      expect(job.contentType).toBe('text/plain; charset=utf-8');
    });

    it('rejects a source that does not answer 2xx', async () => {
      fetchMock.mockResolvedValueOnce(new Response('gone', { status: 404 }));

      await expect(service.submitFromUrl({ sourceUrl: SOURCE_URL })).rejects.toMatchObject({
        code: 'BAD_REQUEST',
        message: 'Source URL answered HTTP 404',
        details: { sourceUrl: SOURCE_URL, status: 404 },
      });
      expect(objectStore.writes).toBe(0);
    });

    it('rejects a source larger than the upload limit', async () => {
      fetchMock
        .mockResolvedValueOnce(
          new Response('tiny', { headers: { 'content-length': String(MAX_UPLOAD_BYTES * 10) } })
        )
        .mockResolvedValueOnce(new Response('a'.repeat(MAX_UPLOAD_BYTES + 1)));

      await expect(service.submitFromUrl({ sourceUrl: SOURCE_URL })).rejects.toThrow(
        'Source document exceeds the upload limit'
      );
      await expect(service.submitFromUrl({ sourceUrl: SOURCE_URL })).rejects.toThrow(
        'Source document exceeds the upload limit'
      );
      expect(objectStore.writes).toBe(0);
      expect(jobRepo.size).toBe(0);
    });

    it('rejects a source of an unsupported type', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('%PDF', { headers: { 'content-type': 'application/pdf' } })
      );

      await expect(
        service.submitFromUrl({ sourceUrl: 'https://books.example.test/river.pdf' })
      ).rejects.toThrow('Unsupported content type: application/pdf');
    });

    it('rejects non-http URLs without fetching', async () => {
      await expect(
        service.submitFromUrl({ sourceUrl: 'ftp://books.example.test/river.md' })
      ).rejects.toThrow('Unsupported sourceUrl scheme: ftp:');
      await expect(service.submitFromUrl({ sourceUrl: 'not a url' })).rejects.toBeInstanceOf(
        BadRequestError
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('reports a source that cannot be reached', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(service.submitFromUrl({ sourceUrl: SOURCE_URL })).rejects.toMatchObject({
        code: 'BAD_REQUEST',
        message: 'Source URL could not be fetched',
        details: { sourceUrl: SOURCE_URL, cause: 'fetch failed' },
      });
    });
  });

  it('sanitizes filenames to one key segment', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('C:\\books\\a b.md')).toBe('a_b.md');
    expect(sanitizeFilename('.hidden')).toBe('hidden');
    expect(sanitizeFilename(undefined)).toBe('document.md');
  });

  describe('lookups', () => {
    it('throws NotFound for an unknown id', async () => {
      await expect(service.getStatus('nope')).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.getResult('nope')).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.cancel('nope')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('reports NotReady until the job finishes', async () => {
      const job = await submit();

      await expect(service.getResult(job.id)).rejects.toBeInstanceOf(NotReadyError);
    });

    it('returns the output reference and size of a succeeded job', async () => {
      const job = await submit();
      await objectStore.put(`published/${job.id}/book.md`, Buffer.from('# Title\n'), 'text/markdown');
      jobRepo.seed({ ...job, status: 'succeeded', outputRef: `published/${job.id}/book.md` });

      await expect(service.getResult(job.id)).resolves.toEqual({
        jobId: job.id,
        outputRef: `published/${job.id}/book.md`,
        sizeBytes: 8,
      });
      const { stream } = await service.openResult(job.id);
      const chunks: Buffer[] = [];
      for await (const chunk of stream) chunks.push(Buffer.from(chunk));
      expect(Buffer.concat(chunks).toString('utf-8')).toBe('# Title\n');
    });

    it('reports the failing stage of a failed job', async () => {
      const job = await submit();
      jobRepo.seed({
        ...job,
        status: 'failed',
        failedStage: 'validate',
        error: 'validate: Document has no title line',
      });

      await expect(service.getResult(job.id)).rejects.toMatchObject({
        code: 'JOB_FAILED',
        details: {
          jobId: job.id,
          stage: 'validate',
          reason: 'validate: Document has no title line',
        },
      });
      await expect(service.getResult(job.id)).rejects.toBeInstanceOf(JobFailedError);
    });
  });

  describe('cancel', () => {
    it('cancels a queued job so no worker can lease it', async () => {
      const job = await submit();

      const cancelled = await service.cancel(job.id);

      expect(cancelled.status).toBe('cancelled');
      await expect(jobRepo.acquireLease(job.id, 'w0', 60000)).rejects.toBeInstanceOf(
        JobNotEligibleError
      );
      await expect(jobRepo.listDispatchable(10)).resolves.toEqual([]);
      await expect(service.getResult(job.id)).rejects.toBeInstanceOf(ConflictError);
    });

    it('refuses to cancel a leased job', async () => {
      const job = await submit();
      await jobRepo.acquireLease(job.id, 'w0', 60000);

      await expect(service.cancel(job.id)).rejects.toBeInstanceOf(ConflictError);
      expect((await jobRepo.get(job.id)).status).toBe('running');
    });

    it('refuses to cancel twice', async () => {
      const job = await submit();
      await service.cancel(job.id);

      await expect(service.cancel(job.id)).rejects.toThrow(
        `Job ${job.id} cannot be cancelled in status cancelled`
      );
    });
  });
});
