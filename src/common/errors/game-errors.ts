// 코어 에러 계층: 게임플레이 실패는 던지지 않고, 경계 입력과 콘텐츠 오류만 던진다

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
    this.name = 'InvalidInputError';
  }
}

export class ContentError extends GameError {
  constructor(message = 'Content error', details?: Record<string, unknown>) {
    super('CONTENT_ERROR', message, details);
    this.name = 'ContentError';
  }
}
