/**
 * FSM Module - Finite State Machine for Isola turn phases
 */

export {
  TurnStateMachine,
  transition,
  type TurnState,
  type TurnPhase,
  type TurnEvent,
  type TransitionResult,
  type TransitionError,
  type Action,
  // Phase states
  type AwaitingMoveState,
  type AwaitingArrowState,
  type GameOverState,
} from './TurnStateMachine';
