import { Module } from '@nestjs/common';
import { NOTIFIER } from '../interfaces/notifier.interface';
import { EmailNotifier } from '../notifiers/email.notifier';
import { AlertGateService } from '../services/alert-gate.service';
import { AlertsController } from '../controllers/alerts.controller';

@Module({
  controllers: [AlertsController],
  providers: [
    EmailNotifier,
    { provide: NOTIFIER, useExisting: EmailNotifier },
    AlertGateService,
  ],
  exports: [AlertGateService],
})
export class AlertsModule {}
