import { BLOCKCHAIN } from '@common/constants/config';
import { NodeSyncClient } from '@common/interfaces';
import { RpcError, getErrorMessage } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { SyncProgress } from '@types';
import { ethers } from 'ethers';

type BlockQuantity = string | number | bigint;

function isBlockQuantity(value: unknown): value is BlockQuantity {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint';
}

/**
 * JSON-RPC client of the monitored node
 */
@Injectable()
export class BlockchainService implements NodeSyncClient, OnModuleDestroy {
  private readonly logger = new Logger(BlockchainService.name);
  private readonly provider: ethers.JsonRpcProvider;
  private readonly endpoint: string;

  constructor(configService: ConfigService) {
    const { nodeUrl } = configService.getSyncMonitorConfig();
    // Only the host is logged: provider URLs often embed an API key in the path
    this.endpoint = new URL(nodeUrl).host;

    // A static network skips chain detection, so a node that is down fails the call
    // instead of parking it until the node comes back
    this.provider = new ethers.JsonRpcProvider(nodeUrl, undefined, {
      staticNetwork: new ethers.Network('monitored-node', 0),
      polling: false,
      batchMaxCount: 1,
    });

    this.logger.log(`Node RPC client created for ${this.endpoint}`);
  }

  onModuleDestroy(): void {
    this.provider.destroy();
    this.logger.log('Node RPC client destroyed');
  }

  /**
   * Ask the node whether it is still syncing
   * @returns `null` when the node reports itself fully synced
   * @throws RpcError when the call fails or the answer cannot be read
   */
  async querySyncProgress(): Promise<SyncProgress | null> {
    const method = BLOCKCHAIN.RPC.METHODS.SYNCING;
    let result: unknown;

    try {
      result = await this.provider.send(method, []);
    } catch (error) {
      throw new RpcError(getErrorMessage(error), this.endpoint, method);
    }

    try {
      return this.parseSyncProgress(result);
    } catch (error) {
      throw new RpcError(`Unexpected ${method} result: ${getErrorMessage(error)}`, this.endpoint, method, {
        result: JSON.stringify(result),
      });
    }
  }

  private parseSyncProgress(result: unknown): SyncProgress | null {
    if (result === false || result === null) {
      return null;
    }

    if (typeof result !== 'object' || !('currentBlock' in result) || !('highestBlock' in result)) {
      throw new Error('expected false or a sync progress object');
    }

    const startingBlock = 'startingBlock' in result ? result.startingBlock : 0;

    return {
      startingBlock: this.toBlockNumber(startingBlock, 'startingBlock'),
      currentBlock: this.toBlockNumber(result.currentBlock, 'currentBlock'),
      highestBlock: this.toBlockNumber(result.highestBlock, 'highestBlock'),
    };
  }

  private toBlockNumber(value: unknown, field: string): bigint {
    if (!isBlockQuantity(value)) {
      throw new Error(`${field} is not a quantity`);
    }
    return ethers.getBigInt(value, field);
  }
}
