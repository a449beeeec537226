// 카드 → 행동 → 대상/존 → 실행: 전투 입력 상태 머신

import { Logger } from '@nestjs/common';
import type {
  ActionDefinition,
  Card,
  CombatEntity,
  CombatRoster,
  FlowStep,
  HandAuthority,
  LayoutProbe,
  MinorActionIntent,
  NoticeCode,
  NotificationSink,
  PhaseAuthority,
  SelectionState,
  SubmittedActionIntent,
  Weapon,
  ZoneAdjacencyProvider,
} from '../../types/index.js';
import type { CombatConfig, CombatConfigService } from '../../config/combat-config.service.js';
import { classifyAction, isMeleeAction } from '../actions/action-kind.js';
import { cardSuitName } from '../actions/action-registry.service.js';
import type { TargetingService } from '../targeting/targeting.service.js';
import type { VigilancePolicyService } from '../vigilance/vigilance-policy.service.js';
import type { InitiativeContext, InitiativeService } from '../initiative/initiative.service.js';
import {
  cardKeyLabel,
  cardKeyRange,
  cardSlotForKey,
  isConfirmKey,
  numberForKey,
} from '../input/input-keys.js';
import { FlowOutput } from './flow-output.js';
import {
  createIdleSelectionState,
  resetSelectionState,
  snapshotSelectionState,
} from './selection-state.js';

/** 전투 하나에 대한 외부 협력자: 선택적 협력자는 null */
export interface SelectionFlowDeps {
  phase: PhaseAuthority;
  hand: HandAuthority;
  adjacency: ZoneAdjacencyProvider | null;
  layout: LayoutProbe | null;
  sink: NotificationSink | null;
}

export interface SelectionFlowServices {
  targeting: TargetingService;
  vigilance: VigilancePolicyService;
  initiative: InitiativeService;
  config: CombatConfigService;
}

const PRIMARY_BUTTON = 1;

export class SelectionFlow {
  private readonly logger = new Logger(SelectionFlow.name);
  private readonly state: SelectionState = createIdleSelectionState();
  private readonly out: FlowOutput;

  constructor(
    private readonly deps: SelectionFlowDeps,
    private readonly services: SelectionFlowServices,
  ) {
    this.out = new FlowOutput(deps.sink, this.logger);
  }

  /** 읽기 전용: 다음 입력 이후에는 유효하지 않을 수 있음 */
  getState(): Readonly<SelectionState> {
    return this.state;
  }

  snapshot(): Readonly<SelectionState> {
    return snapshotSelectionState(this.state);
  }

  /** 대상 대기 중일 때 지금 시점의 합법 대상 (숫자키 순서) */
  getPendingTargets(): CombatEntity[] {
    if (!this.state.awaitingTarget) return [];
    return this.services.targeting.getValidTargets(
      this.state.selectedAction,
      this.state.selectedEntity,
      this.roster(),
    );
  }

  reset(): void {
    resetSelectionState(this.state);
  }

  handleKeyPressed(key: string): FlowStep {
    return this.step(() => this.onKey(key));
  }

  handlePointerPressed(x: number, y: number, button: number): FlowStep {
    return this.step(() => this.onPointer(x, y, button));
  }

  handleActionSelected(
    action: ActionDefinition,
    followUp: ActionDefinition | null = null,
  ): FlowStep {
    return this.step(() => this.onActionSelected(action, followUp));
  }

  handleEntityClicked(entityId: string): FlowStep {
    return this.step(() => this.onEntityClicked(entityId));
  }

  handleZoneClicked(zoneId: string): FlowStep {
    return this.step(() => this.onZoneClicked(zoneId));
  }

  handleChallengeEnded(): FlowStep {
    return this.step(() => {
      this.reset();
      return true;
    });
  }

  showHand(): FlowStep {
    return this.step(() => {
      const active = this.activePC();
      if (!active) return false;
      this.listHand(active);
      return true;
    });
  }

  // ── 이벤트 버퍼 ──

  private step(run: () => boolean): FlowStep {
    this.out.begin();
    const handled = run();
    return { handled, events: this.out.drain() };
  }

  // ── 키 입력 ──

  private onKey(key: string): boolean {
    const { phase } = this.deps;
    if (!phase.isActive()) return false;

    switch (phase.getPhase()) {
      case 'pre_round':
        return this.services.initiative.handleKey(key, this.initiativeContext());
      case 'minor_window':
        return this.onMinorWindowKey(key);
      case 'awaiting_action':
        return this.onTurnKey(key);
      default:
        return false;
    }
  }

  private onTurnKey(key: string): boolean {
    const active = this.activePC();
    if (!active) return false;

    if (this.state.awaitingZone) return this.onZoneKey(key);
    if (this.state.awaitingTarget) return this.onTargetKey(key);

    const slot = cardSlotForKey(key, this.config().actionHandSlots);
    if (slot !== null) {
      if (this.state.selectedCard) return false;
      const card = this.selectCard(active, slot, true);
      if (!card) return true;
      this.out.notice(
        'CARD_SELECTED',
        `${active.name} selected ${card.name} - choose action from Command Board`,
      );
      return true;
    }

    switch (key) {
      case 'h':
        this.listHand(active);
        return true;
      case 'space':
        this.out.notice('PASS', `${active.name} passes`);
        this.reset();
        this.out.emit({ kind: 'CARD_DESELECTED' });
        this.out.emit({ kind: 'UI_SEQUENCE_COMPLETE' });
        return true;
      case 'escape':
        if (!this.state.selectedCard) return false;
        this.cancel('SELECTION_CANCELLED', 'Selection cancelled');
        return true;
      default:
        return false;
    }
  }

  private onMinorWindowKey(key: string): boolean {
    if (this.state.awaitingZone) return this.onZoneKey(key);
    if (this.state.awaitingTarget) return this.onTargetKey(key);

    const config = this.config();
    const slotNumber = numberForKey(key);
    if (slotNumber !== null && slotNumber <= config.partyKeySlots) {
      const pc = this.deps.phase.getPcs()[slotNumber - 1];
      if (!pc) return false;
      this.chooseMinorPC(pc, cardKeyRange(config.actionHandSlots));
      return true;
    }

    const minorPC = this.state.minorPC;
    if (minorPC) {
      const slot = cardSlotForKey(key, config.actionHandSlots);
      if (slot !== null) {
        if (this.state.selectedCard) return false;
        const card = this.selectCard(minorPC, slot, false);
        if (card) {
          this.out.notice(
            'CARD_SELECTED',
            `${minorPC.name} selected ${card.name} for minor action`,
          );
        }
        return true;
      }

      if (key === 'escape') {
        this.cancel('MINOR_PC_CANCELLED', 'PC selection cancelled');
        return true;
      }
    }

    if (isConfirmKey(key)) {
      const result = this.deps.phase.resumeFromMinorWindow();
      if (!result.ok) {
        this.logger.warn(`Resume from minor window failed: ${result.reason}`);
      }
      const hadCard = this.state.selectedCard !== null;
      this.reset();
      if (hadCard) this.out.emit({ kind: 'CARD_DESELECTED' });
      return true;
    }

    return false;
  }

  private onZoneKey(key: string): boolean {
    const zones = this.state.availableZones;
    if (!zones || zones.length === 0) {
      this.reset();
      return false;
    }

    if (key === 'space' && this.state.selectedAction?.id === 'avoid') {
      this.execute(null, null);
      return true;
    }

    const choice = numberForKey(key);
    const zone = choice !== null ? zones[choice - 1] : undefined;
    if (zone) {
      this.execute(null, zone.id);
      return true;
    }

    if (key === 'escape') {
      this.cancel('SELECTION_CANCELLED', 'Zone selection cancelled');
      return true;
    }

    return false;
  }

  private onTargetKey(key: string): boolean {
    if (!this.state.selectedAction) {
      this.reset();
      return false;
    }

    const choice = numberForKey(key);
    const target = choice !== null ? this.getPendingTargets()[choice - 1] : undefined;
    if (target) {
      this.execute(target, null);
      return true;
    }

    if (key === 'escape') {
      this.cancel('SELECTION_CANCELLED', 'Target selection cancelled');
      return true;
    }

    return false;
  }

  // ── 포인터 입력 ──

  private onPointer(x: number, y: number, button: number): boolean {
    const { phase, layout } = this.deps;
    if (button !== PRIMARY_BUTTON || !layout || !phase.isActive()) return false;

    const slots = this.config().actionHandSlots;

    switch (phase.getPhase()) {
      case 'pre_round':
        return this.services.initiative.handlePointer(x, y, this.initiativeContext());

      case 'minor_window': {
        if (!this.state.minorPC) {
          const entity = layout.plateAt(x, y);
          if (entity?.isPC && this.deps.hand.getHand(entity).length > 0) {
            this.chooseMinorPC(entity, `${cardKeyRange(slots)} or click`);
            return true;
          }
        }

        const minorPC = this.state.minorPC;
        if (!minorPC || this.state.selectedCard) return false;
        const index = layout.handCardIndexAt(x, y, minorPC, slots);
        if (index === null) return false;
        return this.selectCard(minorPC, index, false) !== null;
      }

      case 'awaiting_action': {
        const active = this.activePC();
        if (!active || this.state.selectedCard) return false;
        if (this.state.awaitingTarget || this.state.awaitingZone) return false;

        const index = layout.handCardIndexAt(x, y, active, slots);
        if (index === null) return false;
        const card = this.selectCard(active, index, true);
        if (!card) return false;
        this.out.notice(
          'CARD_SELECTED',
          `${active.name} selected ${card.name} - choose action from Command Board`,
        );
        return true;
      }

      default:
        return false;
    }
  }

  // ── 커맨드 보드 / 아레나 ──

  /** 전투 활성 + (주 턴의 PC 차례 또는 마이너 윈도우)일 때만 커맨드 보드/아레나 입력 수용 */
  private acceptsSelectionInput(): boolean {
    const { phase } = this.deps;
    if (!phase.isActive()) return false;

    switch (phase.getPhase()) {
      case 'awaiting_action':
        return this.activePC() !== null;
      case 'minor_window':
        return true;
      default:
        return false;
    }
  }

  private onActionSelected(
    action: ActionDefinition,
    followUp: ActionDefinition | null,
  ): boolean {
    if (!this.acceptsSelectionInput()) return false;

    const { selectedCard, selectedEntity } = this.state;
    if (!selectedCard || !selectedEntity) return false;

    // 행동을 다시 고르면 이전 프롬프트는 버린다
    this.state.awaitingTarget = false;
    this.state.awaitingZone = false;
    this.state.availableZones = null;
    this.state.selectedVigilanceFollowUp = null;
    this.state.selectedAction = action;

    switch (classifyAction(action.id)) {
      case 'REACTIVE':
        if (!followUp) {
          this.cancel('FOLLOW_UP_REQUIRED', 'Select follow-up action from Command Board.');
          return true;
        }
        this.state.selectedVigilanceFollowUp = followUp;
        this.execute(null, null);
        return true;

      case 'ZONE':
        this.promptZone(action, selectedEntity);
        return true;

      case 'MELEE':
      case 'STANDARD':
        if (action.requiresTarget) {
          this.promptTarget(action, selectedEntity);
        } else {
          this.execute(null, null);
        }
        return true;
    }
  }

  private onEntityClicked(entityId: string): boolean {
    if (!this.acceptsSelectionInput()) return false;
    if (!this.state.awaitingTarget || !this.state.selectedAction) return false;

    const target = this.getPendingTargets().find((t) => t.id === entityId);
    if (!target) {
      this.out.notice('INVALID_TARGET', 'Invalid target for action.');
      return false;
    }

    this.execute(target, null);
    return true;
  }

  private onZoneClicked(zoneId: string): boolean {
    if (!this.acceptsSelectionInput()) return false;
    if (!this.state.awaitingZone) return false;

    const zones = this.state.availableZones;
    if (!zones || zones.length === 0) {
      this.reset();
      return false;
    }

    if (!zones.some((zone) => zone.id === zoneId)) {
      this.out.notice('ZONE_NOT_AVAILABLE', `Zone not available for move: ${zoneId}`);
      return false;
    }

    this.execute(null, zoneId);
    return true;
  }

  // ── 프롬프트 ──

  private promptZone(action: ActionDefinition, actor: CombatEntity): void {
    const zones = this.services.targeting.getDestinationZones(
      actor,
      this.deps.phase.getZones(),
      this.deps.adjacency,
    );

    if (zones.length === 0) {
      if (action.id === 'avoid') {
        this.out.notice('AVOID_IN_PLACE', 'No adjacent zones available. Resolving Avoid in place.');
        this.execute(null, null);
      } else {
        this.cancel('NO_ADJACENT_ZONES', 'No adjacent zones available!');
      }
      return;
    }

    this.state.awaitingZone = true;
    this.state.availableZones = zones;

    const range = `1-${zones.length}`;
    const text =
      action.id === 'avoid'
        ? `Select adjacent destination zone (${range}), or press Space to avoid in place:`
        : `Select adjacent destination zone (${range}):`;
    this.out.notice(
      'SELECT_ZONE',
      text,
      zones.map((zone, i) => `${i + 1}: ${zone.name}`),
    );
  }

  private promptTarget(action: ActionDefinition, actor: CombatEntity): void {
    const targets = this.services.targeting.getValidTargets(action, actor, this.roster());

    if (targets.length === 0) {
      if (isMeleeAction(action.id)) {
        this.cancel('NO_ENEMIES_IN_ZONE', 'No enemies in your zone! Use Move to get closer.');
      } else {
        this.cancel('NO_VALID_TARGETS', 'No valid targets available!');
      }
      return;
    }

    this.state.awaitingTarget = true;
    this.out.notice(
      'SELECT_TARGET',
      `Select target (1-${targets.length}):`,
      targets.map((t, i) => `${i + 1}: ${t.name}${t.zone ? ` [${t.zone}]` : ''}`),
    );
  }

  // ── 실행 ──

  private execute(target: CombatEntity | null, destinationZone: string | null): void {
    const { selectedCard, selectedEntity, selectedAction } = this.state;
    if (!selectedCard || !selectedEntity || !selectedAction) {
      this.cancel('INVALID_ACTION_STATE', 'Invalid action state');
      return;
    }

    if (this.deps.phase.getPhase() === 'minor_window') {
      this.executeMinor(selectedEntity, selectedAction, target, destinationZone);
    } else {
      this.executeTurn(selectedEntity, selectedAction, target, destinationZone);
    }
  }

  /** 마이너: 카드를 먼저 버리고 선언 */
  private executeMinor(
    actor: CombatEntity,
    action: ActionDefinition,
    target: CombatEntity | null,
    destinationZone: string | null,
  ): void {
    const { phase, hand } = this.deps;
    const card = this.state.selectedCard;
    const cardIndex = this.state.selectedCardIndex;
    if (!card || cardIndex === null) return;

    const removed = hand.removeCard(actor, cardIndex);
    if (removed) hand.discard(removed);

    const intent: MinorActionIntent = {
      actor,
      card,
      type: action.id,
      target,
      destinationZone,
      weapon: actor.weapon,
      allEntities: phase.getAllCombatants(),
    };

    const result = phase.declareMinorAction(intent);
    if (result.ok) {
      this.out.emit({ kind: 'MINOR_ACTION_DECLARED', intent });
      this.out.notice('ACTION_DECLARED', `${actor.name} declares ${action.name}`);
    } else {
      this.out.notice('MINOR_DECLARE_REJECTED', `Minor action declare failed: ${result.reason}`);
    }

    this.reset();
    this.out.emit({ kind: 'CARD_DESELECTED' });
  }

  /** 주 턴: resolver가 받아들인 뒤에만 카드를 손패에서 제거 */
  private executeTurn(
    actor: CombatEntity,
    action: ActionDefinition,
    target: CombatEntity | null,
    destinationZone: string | null,
  ): void {
    const { phase, hand } = this.deps;
    const card = this.state.selectedCard;
    const cardIndex = this.state.selectedCardIndex;
    if (!card || cardIndex === null) return;

    const intent: SubmittedActionIntent = {
      actor,
      target,
      card,
      type: action.id,
      destinationZone,
      weapon: this.weaponOf(actor),
      allEntities: phase.getAllCombatants(),
    };

    let summary: string;
    if (classifyAction(action.id) === 'REACTIVE') {
      const followUp = this.state.selectedVigilanceFollowUp;
      if (!followUp) {
        this.cancel('FOLLOW_UP_REQUIRED', 'Follow-up action not selected.');
        return;
      }
      const { vigilance } = this.services;
      intent.trigger = vigilance.buildTrigger();
      intent.followUpAction = followUp.id;
      intent.followUpTargetPolicy = vigilance.resolveFollowUpTargetPolicy(followUp);
      summary = `${actor.name} prepares ${followUp.name} when targeted by a hostile action.`;
    } else if (destinationZone) {
      summary = `${actor.name} uses ${action.name} to move to ${destinationZone}`;
    } else {
      summary = `${actor.name} uses ${action.name} on ${target ? target.name : 'no target'}`;
    }

    const result = phase.submitAction(intent);
    if (!result.ok) {
      this.cancel('SUBMIT_REJECTED', `Action submit failed: ${result.reason}`);
      return;
    }

    const removed = hand.removeCard(actor, cardIndex);
    if (removed) hand.discard(removed);

    this.out.emit({ kind: 'ACTION_SUBMITTED', intent });
    this.out.notice('ACTION_DECLARED', summary);
    this.reset();
    this.out.emit({ kind: 'CARD_DESELECTED' });
  }

  // ── 보조 ──

  /** 손패 위치의 카드 선택: 카드는 아직 손패에 남는다 */
  private selectCard(entity: CombatEntity, index: number, isPrimaryTurn: boolean): Card | null {
    const card = this.deps.hand.getHand(entity)[index];
    if (!card) {
      this.out.notice('NO_CARD_AT_POSITION', `No card at position ${index + 1}`);
      return null;
    }

    this.state.selectedEntity = entity;
    this.state.selectedCard = card;
    this.state.selectedCardIndex = index;

    this.out.emit({
      kind: 'CARD_SELECTED',
      entityId: entity.id,
      card,
      cardIndex: index,
      isPrimaryTurn,
    });
    return card;
  }

  private chooseMinorPC(pc: CombatEntity, keyHint: string): void {
    if (this.deps.hand.getHand(pc).length === 0) {
      this.out.notice('MINOR_NO_CARDS', `${pc.name} has no cards!`);
      return;
    }

    // 다른 PC로 바꾸면 진행 중이던 선택은 버린다
    if (this.state.selectedCard) {
      this.reset();
      this.out.emit({ kind: 'CARD_DESELECTED' });
    }

    this.state.minorPC = pc;
    this.out.notice('MINOR_SELECT_CARD', `Select a card for ${pc.name} (${keyHint})`);
  }

  private listHand(entity: CombatEntity): void {
    const cards = this.deps.hand.getHand(entity);
    this.out.notice(
      'HAND_LISTING',
      `${entity.name}'s cards:`,
      cards.map(
        (card, i) =>
          `${cardKeyLabel(i)}: ${card.name} (${cardSuitName(card.suit)}, ${card.value})`,
      ),
    );
  }

  /** 전체 리셋 + 해제 알림 + 안내 */
  private cancel(code: NoticeCode, text: string): void {
    this.out.notice(code, text);
    this.reset();
    this.out.emit({ kind: 'CARD_DESELECTED' });
  }

  private activePC(): CombatEntity | null {
    const active = this.deps.phase.getActiveEntity();
    return active?.isPC ? active : null;
  }

  private weaponOf(actor: CombatEntity): Weapon {
    return actor.weapon ?? { name: this.config().bareHandsWeapon, isMelee: true };
  }

  private roster(): CombatRoster {
    return { npcs: this.deps.phase.getNpcs(), pcs: this.deps.phase.getPcs() };
  }

  private config(): CombatConfig {
    return this.services.config.get();
  }

  private initiativeContext(): InitiativeContext {
    return {
      phase: this.deps.phase,
      hand: this.deps.hand,
      layout: this.deps.layout,
      out: this.out,
      config: this.config(),
    };
  }
}
