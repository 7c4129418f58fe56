export { validateMovement } from './MovementValidator';
export { validateArrow } from './ArrowValidator';
