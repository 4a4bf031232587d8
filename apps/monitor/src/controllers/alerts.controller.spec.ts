import { Test, TestingModule } from '@nestjs/testing';
import { AlertsController } from './alerts.controller';
import { AlertGateService } from '../services/alert-gate.service';
import { AlertRecord } from '../interfaces/alert.interface';

describe('AlertsController', () => {
  let controller: AlertsController;
  let alertGate: { getAlertHistory: jest.Mock; getAlertStats: jest.Mock };

  const alert = (timestamp: number, symbol = 'AAPL'): AlertRecord => ({
    timestamp,
    symbol,
    discrepancyPercent: 0.8,
    sent: true,
    alertType: 'threshold_exceeded',
  });

  beforeEach(async () => {
    alertGate = {
      getAlertHistory: jest.fn().mockReturnValue([alert(1), alert(2), alert(3)]),
      getAlertStats: jest.fn().mockReturnValue({
        totalAlerts: 3,
        uniqueSymbols: 1,
        avgDiscrepancy: 0.8,
        maxDiscrepancy: 0.8,
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AlertsController],
      providers: [{ provide: AlertGateService, useValue: alertGate }],
    }).compile();

    controller = module.get<AlertsController>(AlertsController);
  });

  describe('GET /alerts/history', () => {
    it('should filter by the upper-cased symbol', () => {
      controller.getHistory({ symbol: 'aapl' });
      expect(alertGate.getAlertHistory).toHaveBeenCalledWith('AAPL');
    });

    it('should keep the most recent alerts when limited', () => {
      expect(controller.getHistory({ limit: 2 }).map(a => a.timestamp)).toEqual([2, 3]);
    });
  });

  describe('GET /alerts/stats', () => {
    it('should return the gate statistics', () => {
      expect(controller.getStats()).toEqual({
        totalAlerts: 3,
        uniqueSymbols: 1,
        avgDiscrepancy: 0.8,
        maxDiscrepancy: 0.8,
      });
    });
  });
});
