import { BlockchainService } from '@blockchain/blockchain.service';
import { NODE_SYNC_CLIENT } from '@common/interfaces';
import { Module } from '@nestjs/common';

@Module({
  providers: [BlockchainService, { provide: NODE_SYNC_CLIENT, useExisting: BlockchainService }],
  exports: [NODE_SYNC_CLIENT],
})
export class BlockchainModule {}
