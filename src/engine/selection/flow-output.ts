import type { Logger } from '@nestjs/common';
import type { FlowEvent, NoticeCode, NotificationSink } from '../../types/index.js';

const WARN_CODES = new Set<NoticeCode>([
  'NO_CARD_AT_POSITION',
  'NO_ENEMIES_IN_ZONE',
  'NO_VALID_TARGETS',
  'NO_ADJACENT_ZONES',
  'FOLLOW_UP_REQUIRED',
  'INVALID_TARGET',
  'ZONE_NOT_AVAILABLE',
  'INVALID_ACTION_STATE',
  'SUBMIT_REJECTED',
  'MINOR_DECLARE_REJECTED',
  'INITIATIVE_INVALID_CARD',
  'INITIATIVE_REJECTED',
]);

/** 한 번의 입력 전이 동안 발생한 이벤트 버퍼 + sink 전달 */
export class FlowOutput {
  private buffer: FlowEvent[] = [];

  constructor(
    private readonly sink: NotificationSink | null,
    private readonly logger: Logger,
  ) {}

  begin(): void {
    this.buffer = [];
  }

  drain(): FlowEvent[] {
    const events = this.buffer;
    this.buffer = [];
    return events;
  }

  emit(event: FlowEvent): void {
    this.buffer.push(event);
    this.sink?.emit(event);
  }

  notice(code: NoticeCode, text: string, lines?: string[]): void {
    this.emit(lines ? { kind: 'NOTICE', code, text, lines } : { kind: 'NOTICE', code, text });
    if (WARN_CODES.has(code)) {
      this.logger.warn(text);
    } else {
      this.logger.log(text);
    }
  }
}
