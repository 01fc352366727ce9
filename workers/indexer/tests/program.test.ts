import { describe, it, expect, vi } from 'vitest';
import type { Command } from 'commander';
import { createIndexerProgram } from '../src/cli/program';

function quiet(program: Command): Command {
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  }
  return program;
}

describe('indexer program', () => {
  const setup = () => {
    const handlers = {
      ingest: vi.fn(async () => undefined),
      info: vi.fn(async () => undefined),
      collections: vi.fn(async () => undefined),
      drop: vi.fn(async () => undefined)
    };
    return { handlers, program: quiet(createIndexerProgram(handlers)) };
  };

  it('should ingest by default', async () => {
    const { handlers, program } = setup();

    await program.parseAsync(['node', 'imagefind-index', 'photos']);

    expect(handlers.ingest).toHaveBeenCalledWith('photos', {
      verifyIndex: false,
      onDisk: true,
      quantization: true
    });
  });

  it('should parse ingest flags', async () => {
    const { handlers, program } = setup();

    await program.parseAsync([
      'node',
      'imagefind-index',
      'ingest',
      'photos',
      '-c',
      'holiday',
      '-b',
      '8',
      '--upsert-chunk-size',
      '16',
      '--io-concurrency',
      '4',
      '--verify-index',
      '--no-on-disk',
      '--no-quantization'
    ]);

    expect(handlers.ingest).toHaveBeenCalledWith('photos', {
      collection: 'holiday',
      batchSize: 8,
      upsertChunkSize: 16,
      ioConcurrency: 4,
      verifyIndex: true,
      onDisk: false,
      quantization: false
    });
  });

  it('should run info', async () => {
    const { handlers, program } = setup();

    await program.parseAsync(['node', 'imagefind-index', 'info', '-c', 'holiday']);

    expect(handlers.info).toHaveBeenCalledWith({ collection: 'holiday' });
    expect(handlers.ingest).not.toHaveBeenCalled();
  });

  it('should list and drop collections', async () => {
    const listing = setup();
    await listing.program.parseAsync(['node', 'imagefind-index', 'collections']);
    expect(listing.handlers.collections).toHaveBeenCalledTimes(1);

    const dropping = setup();
    await dropping.program.parseAsync(['node', 'imagefind-index', 'drop', 'holiday']);
    expect(dropping.handlers.drop).toHaveBeenCalledWith('holiday');
  });

  it('should reject a non-positive batch size', async () => {
    const { handlers, program } = setup();

    await expect(program.parseAsync(['node', 'imagefind-index', 'photos', '-b', '0'])).rejects.toThrow(
      /Expected a positive integer/
    );
    expect(handlers.ingest).not.toHaveBeenCalled();
  });
});
