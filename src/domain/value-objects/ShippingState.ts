export enum ShippingState {
  IDLE = 'idle',
  LOCKING = 'locking',
  READING = 'reading',
  NO_DATA = 'no-data',
  SHIPPING = 'shipping',
  SETTLING = 'settling',
  SHUTTING_DOWN = 'shutting-down'
}

const VALID_TRANSITIONS: Record<ShippingState, ShippingState[]> = {
  [ShippingState.IDLE]: [ShippingState.LOCKING, ShippingState.SHUTTING_DOWN],
  [ShippingState.LOCKING]: [ShippingState.READING, ShippingState.SETTLING],
  [ShippingState.READING]: [ShippingState.NO_DATA, ShippingState.SHIPPING, ShippingState.SETTLING],
  [ShippingState.NO_DATA]: [ShippingState.SETTLING],
  [ShippingState.SHIPPING]: [ShippingState.SETTLING],
  [ShippingState.SETTLING]: [ShippingState.READING, ShippingState.IDLE, ShippingState.SHUTTING_DOWN],
  [ShippingState.SHUTTING_DOWN]: []
};

export class ShippingStateValidator {
  public static isValidTransition(from: ShippingState, to: ShippingState): boolean {
    return VALID_TRANSITIONS[from]?.includes(to) ?? false;
  }

  public static getAllowedTransitions(from: ShippingState): ShippingState[] {
    return VALID_TRANSITIONS[from] ?? [];
  }
}
