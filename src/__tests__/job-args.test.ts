import { describe, it, expect } from 'vitest';
import { optionsFromArgs } from '../utils/job-args.util';
import { ValidationError, parseJobRequest } from '../validators/job-request.validator';

describe('optionsFromArgs', () => {
  it('maps fetch flags to request options', () => {
    expect(optionsFromArgs('fetch', ['--project-filter', 'Alpha', '--batch-size', '5', '--incremental'])).toEqual({
      projectFilter: 'Alpha',
      batchSize: 5,
      batchNumber: undefined,
      incremental: true,
      completedSince: undefined,
    });
  });

  it('splits the export month list', () => {
    expect(optionsFromArgs('export', ['--months', '2024-02, 2024-03'])).toEqual({ months: ['2024-02', '2024-03'] });
  });

  it('defaults a digest to the daily period and passes only the given flags', () => {
    expect(optionsFromArgs('digest', [])).toEqual({ period: 'daily' });
    expect(optionsFromArgs('digest', ['--period', 'monthly', '--month', '2024-03', '--top-n', '3'])).toEqual({
      period: 'monthly',
      month: '2024-03',
      topN: 3,
    });
  });

  it('produces options the request validator accepts', () => {
    expect(parseJobRequest('digest', optionsFromArgs('digest', ['--date', '2024-03-15']))).toEqual({
      job: 'digest',
      options: { period: 'daily', date: '2024-03-15' },
    });
  });

  it('rejects a flag that belongs to another job', () => {
    let caught: unknown;
    try {
      optionsFromArgs('fetch', ['--months', '2024-03']);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'Option not supported by the fetch job',
      issues: ['--months: not a fetch option'],
    });
  });

  it('rejects fetch flags on a snapshot', () => {
    expect(() => optionsFromArgs('snapshot', ['--incremental'])).toThrow('Option not supported by the snapshot job');
  });

  it('rejects flags it does not know', () => {
    expect(() => optionsFromArgs('export', ['--verbose'])).toThrow();
  });
});
