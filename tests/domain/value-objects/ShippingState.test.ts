import { ShippingState, ShippingStateValidator } from '../../../src/domain/value-objects/ShippingState';

describe('ShippingState Value Object', () => {
  describe('Valid Transitions', () => {
    it('should allow IDLE to LOCKING', () => {
      expect(ShippingStateValidator.isValidTransition(ShippingState.IDLE, ShippingState.LOCKING)).toBe(true);
    });

    it('should allow READING to SHIPPING and NO_DATA', () => {
      expect(ShippingStateValidator.isValidTransition(ShippingState.READING, ShippingState.SHIPPING)).toBe(true);
      expect(ShippingStateValidator.isValidTransition(ShippingState.READING, ShippingState.NO_DATA)).toBe(true);
    });

    it('should allow SETTLING to loop back to READING', () => {
      expect(ShippingStateValidator.isValidTransition(ShippingState.SETTLING, ShippingState.READING)).toBe(true);
    });

    it('should allow shutting down from IDLE and SETTLING', () => {
      expect(ShippingStateValidator.isValidTransition(ShippingState.IDLE, ShippingState.SHUTTING_DOWN)).toBe(true);
      expect(ShippingStateValidator.isValidTransition(ShippingState.SETTLING, ShippingState.SHUTTING_DOWN)).toBe(true);
    });
  });

  describe('Invalid Transitions', () => {
    it('should not allow IDLE to SHIPPING', () => {
      expect(ShippingStateValidator.isValidTransition(ShippingState.IDLE, ShippingState.SHIPPING)).toBe(false);
    });

    it('should not allow NO_DATA to SHIPPING', () => {
      expect(ShippingStateValidator.isValidTransition(ShippingState.NO_DATA, ShippingState.SHIPPING)).toBe(false);
    });

    it('should not allow leaving SHUTTING_DOWN', () => {
      expect(ShippingStateValidator.getAllowedTransitions(ShippingState.SHUTTING_DOWN)).toEqual([]);
    });
  });

  describe('Get Allowed Transitions', () => {
    it('should return correct allowed transitions for SETTLING', () => {
      expect(ShippingStateValidator.getAllowedTransitions(ShippingState.SETTLING)).toEqual([
        ShippingState.READING,
        ShippingState.IDLE,
        ShippingState.SHUTTING_DOWN
      ]);
    });
  });
});
