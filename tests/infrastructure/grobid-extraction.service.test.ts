import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  GrobidExtractionService,
  buildApiBase,
  buildFormFields,
} from '../../src/infrastructure/services/grobid-extraction.service.js';
import {
  createOptionSet,
  createProcessingRequest,
  type OptionSet,
} from '../../src/core/domain/entities/processing-request.entity.js';
import { TransportError } from '../../src/core/domain/errors.js';
import { GrobidStub, freePort } from '../helpers/grobid-stub.js';
import { makeTempDir, removeDir, touch } from '../helpers/fakes.js';

const allOn: OptionSet = createOptionSet({
  generateIds: true,
  consolidateHeader: true,
  consolidateCitations: true,
  includeCoordinates: true,
  coordinateScheme: 'persName,figure,ref',
});

const allOff: OptionSet = createOptionSet({
  generateIds: false,
  consolidateHeader: false,
  consolidateCitations: false,
  includeCoordinates: false,
  coordinateScheme: 'persName,figure,ref',
});

describe('buildApiBase', () => {
  it.each([
    [{ host: 'localhost', port: 8070 }, 'http://localhost:8070'],
    [{ host: 'localhost', port: null }, 'http://localhost'],
    [{ host: 'https://grobid.example.org/', port: null }, 'https://grobid.example.org'],
    [{ host: 'http://10.0.0.5', port: 8080 }, 'http://10.0.0.5:8080'],
  ])('%o -> %s', (server, expected) => {
    expect(buildApiBase(server)).toBe(expected);
  });
});

describe('buildFormFields', () => {
  it('sends every enabled flag as "1" and the coordinate scheme as text', () => {
    expect(buildFormFields(allOn)).toEqual([
      ['generate_ids', '1'],
      ['consolidate_header', '1'],
      ['consolidate_citations', '1'],
      ['tei_coordinates', 'persName,figure,ref'],
    ]);
  });

  it('sends nothing when every option is off', () => {
    expect(buildFormFields(allOff)).toEqual([]);
  });
});

describe('GrobidExtractionService', () => {
  let dir: string;
  let pdf: string;
  let stub: GrobidStub;
  let service: GrobidExtractionService | undefined;

  beforeEach(() => {
    dir = makeTempDir();
    [pdf] = touch(dir, ['paper.pdf'], '%PDF-1.4 fake');
  });

  afterEach(async () => {
    await service?.close();
    service = undefined;
    await stub?.stop();
    removeDir(dir);
  });

  const connect = async (apiToken?: string): Promise<GrobidExtractionService> => {
    const port = await stub.start();
    service = new GrobidExtractionService({ host: '127.0.0.1', port, timeoutMs: 5000, apiToken });
    return service;
  };

  it('posts the PDF as multipart form data to the operation endpoint', async () => {
    stub = new GrobidStub(() => ({ status: 200, body: '<TEI>ok</TEI>' }));
    const client = await connect();

    const response = await client.submit(createProcessingRequest(pdf, 'processFulltextDocument', allOn));

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('<TEI>ok</TEI>');
    expect(response.latencyMs).toBeGreaterThanOrEqual(0);

    expect(stub.received).toHaveLength(1);
    const [req] = stub.received;
    expect(req.method).toBe('POST');
    expect(req.url).toBe('/api/processFulltextDocument');
    expect(req.headers.accept).toBe('text/plain');
    expect(req.headers.authorization).toBeUndefined();
    expect(req.headers['content-type']?.startsWith('multipart/form-data; boundary=')).toBe(true);
    expect(req.body).toContain('name="input"; filename="paper.pdf"');
    expect(req.body).toContain('Content-Type: application/pdf\r\n\r\n%PDF-1.4 fake\r\n');
    expect(req.body).toContain('name="generate_ids"\r\n\r\n1\r\n');
    expect(req.body).toContain('name="consolidate_header"\r\n\r\n1\r\n');
    expect(req.body).toContain('name="consolidate_citations"\r\n\r\n1\r\n');
    expect(req.body).toContain('name="tei_coordinates"\r\n\r\npersName,figure,ref\r\n');
  });

  it('omits disabled options from the form', async () => {
    stub = new GrobidStub();
    const client = await connect();

    await client.submit(createProcessingRequest(pdf, 'processHeaderDocument', allOff));

    const [req] = stub.received;
    expect(req.url).toBe('/api/processHeaderDocument');
    expect(req.body).not.toContain('name="generate_ids"');
    expect(req.body).not.toContain('name="tei_coordinates"');
  });

  it('adds a bearer token when one is configured', async () => {
    stub = new GrobidStub();
    const client = await connect('test-secret');

    await client.submit(createProcessingRequest(pdf, 'processReferences', allOff));

    expect(stub.received[0].headers.authorization).toBe('Bearer test-secret');
  });

  it('hands a 503 back to the caller without retrying it', async () => {
    stub = new GrobidStub(() => ({ status: 503, body: 'busy' }));
    const client = await connect();

    const response = await client.submit(createProcessingRequest(pdf, 'processFulltextDocument', allOff));

    expect(response.statusCode).toBe(503);
    expect(response.body).toBe('busy');
    expect(stub.received).toHaveLength(1);
  });

  it('reports alive only when /api/isalive answers 200', async () => {
    stub = new GrobidStub();
    const client = await connect();

    expect(await client.isAlive()).toBe(true);
    stub.aliveStatus = 500;
    expect(await client.isAlive()).toBe(false);
  });

  describe('without a server', () => {
    let port: number;

    beforeEach(async () => {
      stub = new GrobidStub();
      port = await freePort();
    });

    it('is not alive', async () => {
      service = new GrobidExtractionService({ host: '127.0.0.1', port, timeoutMs: 2000 });
      expect(await service.isAlive()).toBe(false);
    });

    it('raises a TransportError naming the endpoint', async () => {
      service = new GrobidExtractionService({ host: '127.0.0.1', port, timeoutMs: 2000 });
      const request = createProcessingRequest(pdf, 'processFulltextDocument', allOff);

      const error = await service.submit(request).then(
        () => undefined,
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(TransportError);
      if (!(error instanceof TransportError)) return;
      expect(error.url).toBe(`http://127.0.0.1:${port}/api/processFulltextDocument`);
    });
  });
});
