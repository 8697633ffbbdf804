import { describe, it, expect } from 'vitest';
import {
  ToolCallAggregator,
  INCOMPLETE_TOOL_CALLS_MESSAGE,
  NO_TOOL_CALLS_MESSAGE,
} from './tool-calls.js';
import { StreamCorruptionError } from '../../types/error.js';

describe('ToolCallAggregator', () => {
  it('should concatenate argument fragments for one index', () => {
    const aggregator = new ToolCallAggregator();
    aggregator.add({ index: 0, id: 'call_1', function: { name: 'web_search', arguments: '{"qu' } });
    aggregator.add({ index: 0, function: { arguments: 'ery":"x"}' } });

    expect(aggregator.finalize()).toEqual({
      toolCalls: [{ id: 'call_1', name: 'web_search', arguments: '{"query":"x"}' }],
      error: null,
    });
  });

  it('should accept an id that arrives after the name and arguments', () => {
    const aggregator = new ToolCallAggregator();
    aggregator.add({ index: 0, function: { name: 'web_search', arguments: '{}' } });
    aggregator.add({ index: 0, id: 'call_late' });

    expect(aggregator.finalize().toolCalls).toEqual([
      { id: 'call_late', name: 'web_search', arguments: '{}' },
    ]);
  });

  it('should emit calls in ascending index order', () => {
    const aggregator = new ToolCallAggregator();
    aggregator.add({ index: 2, id: 'call_c', function: { name: 'c' } });
    aggregator.add({ index: 0, id: 'call_a', function: { name: 'a' } });
    aggregator.add({ index: 1, id: 'call_b', function: { name: 'b' } });

    expect(aggregator.finalize().toolCalls.map((call) => call.id)).toEqual([
      'call_a',
      'call_b',
      'call_c',
    ]);
  });

  it('should treat a missing index as index 0', () => {
    const aggregator = new ToolCallAggregator();
    aggregator.add({ id: 'call_1', function: { name: 'web_search' } });
    aggregator.add({ function: { arguments: '{"query":"y"}' } });

    expect(aggregator.size).toBe(1);
    expect(aggregator.finalize().toolCalls).toEqual([
      { id: 'call_1', name: 'web_search', arguments: '{"query":"y"}' },
    ]);
  });

  it('should default empty arguments to an empty object', () => {
    const aggregator = new ToolCallAggregator();
    aggregator.add({ index: 0, id: 'call_1', function: { name: 'ping', arguments: '' } });

    expect(aggregator.finalize().toolCalls[0]?.arguments).toBe('{}');
  });

  it('should not let empty fragments overwrite an id or name', () => {
    const aggregator = new ToolCallAggregator();
    aggregator.add({ index: 0, id: 'call_1', function: { name: 'web_search' } });
    aggregator.add({ index: 0, id: '', function: { name: '', arguments: '{}' } });

    expect(aggregator.finalize().toolCalls).toEqual([
      { id: 'call_1', name: 'web_search', arguments: '{}' },
    ]);
  });

  it('should drop incomplete calls and report them once', () => {
    const aggregator = new ToolCallAggregator();
    aggregator.add({ index: 0, id: 'call_1', function: { name: 'web_search', arguments: '{}' } });
    aggregator.add({ index: 1, function: { name: 'no_id' } });
    aggregator.add({ index: 2, id: 'call_3' });

    const { toolCalls, error } = aggregator.finalize();

    expect(toolCalls).toEqual([{ id: 'call_1', name: 'web_search', arguments: '{}' }]);
    expect(error).toBeInstanceOf(StreamCorruptionError);
    expect(error?.message).toBe(INCOMPLETE_TOOL_CALLS_MESSAGE);
  });

  it('should report an error when finalizing with nothing accumulated', () => {
    const { toolCalls, error } = new ToolCallAggregator().finalize();

    expect(toolCalls).toEqual([]);
    expect(error?.message).toBe(NO_TOOL_CALLS_MESSAGE);
  });

  it('should be empty after finalize', () => {
    const aggregator = new ToolCallAggregator();
    aggregator.add({ index: 0, id: 'call_1', function: { name: 'web_search' } });
    aggregator.finalize();

    expect(aggregator.size).toBe(0);
  });
});
