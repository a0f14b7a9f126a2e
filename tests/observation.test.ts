import { parseObservations, summarizeObservations } from '../src/core/entities/Observation.js';
import {
  InferenceRequestError,
  InferenceTimeoutError,
  ModelUnavailableError,
  classifyError,
} from '../src/core/errors.js';

describe('Observations', () => {
  const chunkOutput = JSON.stringify([
    {
      observation: 'Marie Curie worked in Paris',
      relationship: 'worked',
      entities: [
        { label: 'Marie Curie', category: 'Person' },
        { label: 'Paris', category: 'Location' },
      ],
    },
  ]);

  test('should parse a JSON array of observations', () => {
    const parsed = parseObservations(chunkOutput);

    expect(parsed).toHaveLength(1);
    expect(parsed[0].relationship).toBe('worked');
    expect(parsed[0].entities.map((e) => e.label)).toEqual(['Marie Curie', 'Paris']);
  });

  test('should yield nothing for output that is not JSON', () => {
    expect(parseObservations('Sure! Here are the observations:')).toEqual([]);
  });

  test('should yield nothing for JSON of the wrong shape', () => {
    expect(parseObservations('{"observation": "x"}')).toEqual([]);
    expect(parseObservations('[{"observation": "x", "entities": []}]')).toEqual([]);
  });

  test('should count observations and distinct entities across chunks', () => {
    const second = JSON.stringify([
      {
        observation: 'Marie Curie won the Nobel Prize',
        relationship: 'won',
        entities: [
          { label: 'Marie Curie', category: 'Person' },
          { label: 'Nobel Prize', category: 'Event' },
        ],
      },
    ]);

    expect(summarizeObservations([chunkOutput, second, 'not json'])).toEqual({
      observationsCount: 2,
      entitiesCount: 3,
    });
  });
});

describe('classifyError', () => {
  test('should classify the inference errors by type', () => {
    expect(classifyError(new InferenceTimeoutError('A', 20))).toBe('timeout');
    expect(classifyError(new ModelUnavailableError('A', 'gemma3'))).toBe('capability');
    expect(classifyError(new InferenceRequestError('A', 'HTTP error! status: 500', 500))).toBe('server');
    expect(classifyError(new InferenceRequestError('A', 'Request to A failed: socket hang up'))).toBe('network');
  });

  test('should fall back to the message', () => {
    expect(classifyError(new Error('connect ECONNREFUSED 127.0.0.1:11434'))).toBe('network');
    expect(classifyError(new Error('operation timed out'))).toBe('timeout');
    expect(classifyError('something odd')).toBe('unknown');
  });
});
