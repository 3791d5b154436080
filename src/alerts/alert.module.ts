import { AlertService } from '@alerts/alert.service';
import { NOTIFIER } from '@common/interfaces';
import { Module } from '@nestjs/common';

@Module({
  providers: [AlertService, { provide: NOTIFIER, useExisting: AlertService }],
  exports: [AlertService, NOTIFIER],
})
export class AlertModule {}
