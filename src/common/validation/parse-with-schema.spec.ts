import { z } from 'zod';
import { parseWithSchema } from './parse-with-schema.js';
import { GameError, InvalidInputError } from '../errors/game-errors.js';

const PointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('parseWithSchema', () => {
  it('유효한 값 → 파싱된 값 반환', () => {
    expect(parseWithSchema(PointSchema, { x: 1, y: 2 })).toEqual({ x: 1, y: 2 });
  });

  it('잘못된 값 → InvalidInputError + path: message 형식 issues', () => {
    const error = captureError(() =>
      parseWithSchema(PointSchema, { x: 1, y: 'two' }, 'Bad point'),
    );

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toBeInstanceOf(GameError);
    if (!(error instanceof InvalidInputError)) return;
    expect(error.code).toBe('INVALID_INPUT');
    expect(error.message).toBe('Bad point');
    expect(error.details).toEqual({
      issues: ['y: Expected number, received string'],
    });
  });

  it('default가 있는 스키마 → 기본값 채움', () => {
    const schema = z.object({ slots: z.number().default(3) });
    expect(parseWithSchema(schema, {})).toEqual({ slots: 3 });
  });
});
