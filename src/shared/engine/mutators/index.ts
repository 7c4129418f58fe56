export { mutateMovement } from './MovementMutator';
export type { MovementOutcome } from './MovementMutator';
export { mutateArrow } from './ArrowMutator';
