import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { PriceValidator } from './price.validator';
import { PriceSourceId } from '../interfaces/price-reading.interface';
import { MonitorEvents } from '../events/monitor.events';
import { createEventEmitter } from '../__mocks__/monitor.fixtures';

describe('PriceValidator', () => {
  let validator: PriceValidator;
  let eventEmitter: ReturnType<typeof createEventEmitter>;

  afterEach(() => {
    jest.restoreAllMocks();
  });

  beforeEach(async () => {
    eventEmitter = createEventEmitter();
    const module: TestingModule = await Test.createTestingModule({
      providers: [PriceValidator, { provide: EventEmitter2, useValue: eventEmitter }],
    }).compile();

    validator = module.get<PriceValidator>(PriceValidator);
  });

  describe('accepted prices', () => {
    it('should return a positive finite number unchanged', () => {
      expect(validator.validate(187.42, PriceSourceId.YAHOO_FINANCE, 'AAPL')).toBe(187.42);
      expect(eventEmitter.emit).not.toHaveBeenCalled();
    });

    it('should parse numeric strings', () => {
      expect(validator.validate('187.4200', PriceSourceId.ALPHA_VANTAGE, 'AAPL')).toBe(187.42);
    });

    it('should accept very small positive prices', () => {
      expect(validator.validate(0.0001, PriceSourceId.YAHOO_FINANCE, 'PENNY')).toBe(0.0001);
    });
  });

  describe('rejected prices', () => {
    it.each([
      ['null', null, 'price is missing'],
      ['undefined', undefined, 'price is missing'],
      ['zero', 0, 'price is zero'],
      ['negative', -5, 'price is negative'],
      ['Infinity', Infinity, 'price is not finite'],
      ['NaN', NaN, 'price is not numeric: null'],
      ['a word', 'abc', 'price is not numeric: "abc"'],
      ['a blank string', '   ', 'price is not numeric: "   "'],
      ['a hex string', '0x10', 'price is not numeric: "0x10"'],
      ['a binary string', '0b101', 'price is not numeric: "0b101"'],
      ['an exponent string', '1e3', 'price is not numeric: "1e3"'],
      ['a negative decimal string', '-5.5', 'price is negative'],
      ['an object', { price: 1 }, 'price is not numeric: {"price":1}'],
    ])('should reject %s', (_label, raw, reason) => {
      expect(validator.validate(raw, PriceSourceId.ALPHA_VANTAGE, 'AAPL')).toBeNull();
      expect(eventEmitter.emit).toHaveBeenCalledWith(MonitorEvents.PRICE_REJECTED, {
        symbol: 'AAPL',
        source: PriceSourceId.ALPHA_VANTAGE,
        reason,
      });
    });

    it('should not throw on rejection', () => {
      expect(() => validator.validate('-1', PriceSourceId.YAHOO_FINANCE, 'MSFT')).not.toThrow();
    });

    it('should log a warning naming the source and symbol', () => {
      const loggerSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      validator.validate(0, PriceSourceId.YAHOO_FINANCE, 'MSFT');
      expect(loggerSpy).toHaveBeenCalledWith('Invalid price from yahoo_finance for MSFT: price is zero');
    });
  });
});
