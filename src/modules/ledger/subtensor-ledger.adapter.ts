import { Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';
import { ApiPromise, WsProvider } from '@polkadot/api';
import { Keyring } from '@polkadot/keyring';
import type { KeyringPair } from '@polkadot/keyring/types';
import { cryptoWaitReady } from '@polkadot/util-crypto';

import { parseRaoAmount, raoToTao, taoToRao } from './ledger-units';
import { LedgerNotInitializedError, TradeSubmissionError } from '../../common/errors';
import { executeWithExponentialBackoff } from '../../common/utils/network/exponential-backoff.util';
import { withTimeout } from '../../common/utils/network/with-timeout.util';
import { AppConfigService } from '../../config/app-config.service';
import type {
  ILedgerClient,
  ILedgerStakeRequest,
  ILedgerSubmissionReceipt,
} from '../../core/ports/ledger/ledger-client.interfaces';

const SUBTENSOR_PALLET = 'subtensorModule';
const DIVIDENDS_STORAGE_ITEM = 'taoDividendsPerSubnet';
const ADD_STAKE_CALL = 'addStake';
const REMOVE_STAKE_CALL = 'removeStake';
const PROVIDER_RECONNECT_DELAY_MS = 2500;
const SS58_GENERIC_FORMAT = 42;

type ExtrinsicSubscription = {
  unsubscribe: (() => void) | null;
};

@Injectable()
export class SubtensorLedgerAdapter implements ILedgerClient, OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(SubtensorLedgerAdapter.name);
  private api: ApiPromise | null = null;
  private signingPair: KeyringPair | null = null;
  private initializationError: string | null = null;

  public constructor(private readonly appConfigService: AppConfigService) {}

  public onModuleInit(): void {
    if (!this.appConfigService.ledgerEnabled) {
      this.initializationError = 'Ledger client is disabled by config';
      this.logger.warn('Ledger client disabled (LEDGER_ENABLED=false)');
      return;
    }

    void this.initialize().catch((error: unknown): void => {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`Ledger initialization aborted: ${errorMessage}`);
    });
  }

  public async onModuleDestroy(): Promise<void> {
    const api: ApiPromise | null = this.api;
    this.api = null;

    if (api !== null) {
      await api.disconnect();
      this.logger.log('Ledger client disconnected');
    }
  }

  public async initialize(): Promise<void> {
    const wsUrl: string = this.appConfigService.ledgerWsUrl;

    try {
      this.api = await executeWithExponentialBackoff(
        async (attempt: number): Promise<ApiPromise> => this.connect(wsUrl, attempt),
        {
          maxAttempts: this.appConfigService.ledgerConnectMaxAttempts,
          baseDelayMs: this.appConfigService.ledgerConnectBackoffMs,
          shouldRetry: (): boolean => true,
          onRetry: (error: unknown, attempt: number, delayMs: number): void => {
            const errorMessage: string = error instanceof Error ? error.message : String(error);
            this.logger.warn(
              `Ledger connect attempt ${String(attempt)} failed: ${errorMessage}; retry in ${String(delayMs)}ms`,
            );
          },
        },
      );
      this.signingPair = await this.loadSigningPair();
      this.initializationError = null;
      this.logger.log(`Ledger client connected url=${wsUrl}`);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.initializationError = errorMessage;
      this.logger.error(`Ledger client unavailable, running degraded: ${errorMessage}`);
    }
  }

  public isInitialized(): boolean {
    return this.api !== null && this.api.isConnected;
  }

  public getInitializationError(): string | null {
    if (this.api !== null && !this.api.isConnected) {
      return 'Ledger websocket disconnected';
    }

    return this.initializationError;
  }

  public async queryDividend(subnetId: number, accountKey: string): Promise<number> {
    const api: ApiPromise = this.requireApi();

    if (!(SUBTENSOR_PALLET in api.query)) {
      throw new Error(`Storage pallet ${SUBTENSOR_PALLET} is not available on this chain`);
    }

    const storageItem = api.query[SUBTENSOR_PALLET][DIVIDENDS_STORAGE_ITEM];

    if (storageItem === undefined) {
      throw new Error(`Storage item ${DIVIDENDS_STORAGE_ITEM} is not available on this chain`);
    }

    const rawValue: { toString(): string } = await storageItem(subnetId, accountKey);

    return raoToTao(parseRaoAmount(rawValue.toString()));
  }

  public async submitStake(request: ILedgerStakeRequest): Promise<ILedgerSubmissionReceipt> {
    return this.submitStakeCall(ADD_STAKE_CALL, request);
  }

  public async submitUnstake(request: ILedgerStakeRequest): Promise<ILedgerSubmissionReceipt> {
    return this.submitStakeCall(REMOVE_STAKE_CALL, request);
  }

  private async connect(wsUrl: string, attempt: number): Promise<ApiPromise> {
    this.logger.log(`Connecting to ledger url=${wsUrl} attempt=${String(attempt)}`);
    const provider: WsProvider = new WsProvider(
      wsUrl,
      PROVIDER_RECONNECT_DELAY_MS,
      {},
      this.appConfigService.ledgerQueryTimeoutMs,
    );

    try {
      return await ApiPromise.create({ provider, throwOnConnect: true, noInitWarn: true });
    } catch (error: unknown) {
      await provider.disconnect().catch((disconnectError: unknown): void => {
        const errorMessage: string =
          disconnectError instanceof Error ? disconnectError.message : String(disconnectError);
        this.logger.warn(`Ledger provider cleanup failed: ${errorMessage}`);
      });
      throw error;
    }
  }

  private async loadSigningPair(): Promise<KeyringPair | null> {
    const mnemonic: string | null = this.appConfigService.ledgerWalletMnemonic;

    if (mnemonic === null) {
      this.logger.warn('LEDGER_WALLET_MNEMONIC is not set; stake submissions are disabled');
      return null;
    }

    await cryptoWaitReady();
    const keyring: Keyring = new Keyring({ type: 'sr25519', ss58Format: SS58_GENERIC_FORMAT });

    return keyring.addFromMnemonic(mnemonic);
  }

  private requireApi(): ApiPromise {
    if (this.api === null || !this.api.isConnected) {
      throw new LedgerNotInitializedError(this.getInitializationError());
    }

    return this.api;
  }

  private async submitStakeCall(
    callName: string,
    request: ILedgerStakeRequest,
  ): Promise<ILedgerSubmissionReceipt> {
    const api: ApiPromise = this.requireApi();

    if (this.signingPair === null) {
      throw new TradeSubmissionError('Ledger wallet is not configured (LEDGER_WALLET_MNEMONIC)');
    }

    if (!(SUBTENSOR_PALLET in api.tx)) {
      throw new TradeSubmissionError(`Extrinsic pallet ${SUBTENSOR_PALLET} is not available`);
    }

    const callFactory = api.tx[SUBTENSOR_PALLET][callName];

    if (callFactory === undefined) {
      throw new TradeSubmissionError(`Extrinsic ${SUBTENSOR_PALLET}.${callName} is not available`);
    }

    const amountRao: bigint = taoToRao(request.amountTao);
    this.logger.log(
      `Submitting ${callName} netuid=${String(request.subnetId)} hotkey=${request.accountKey} rao=${amountRao.toString()}`,
    );

    const extrinsic = callFactory(request.accountKey, request.subnetId, amountRao);
    const signingPair: KeyringPair = this.signingPair;
    const subscription: ExtrinsicSubscription = { unsubscribe: null };

    try {
      const txRef: string = await withTimeout(
        new Promise<string>(
          (resolve: (txRef: string) => void, reject: (reason: Error) => void): void => {
            extrinsic
              .signAndSend(signingPair, (result): void => {
                if (result.dispatchError !== undefined) {
                  const dispatchError = result.dispatchError;
                  const reason: string = dispatchError.isModule
                    ? this.describeModuleError(api, dispatchError.asModule)
                    : dispatchError.toString();
                  reject(new TradeSubmissionError(`${callName} rejected: ${reason}`));
                  return;
                }

                if (result.status.isInBlock || result.status.isFinalized) {
                  resolve(result.txHash.toHex());
                  return;
                }

                if (result.status.isInvalid || result.status.isDropped || result.status.isUsurped) {
                  reject(
                    new TradeSubmissionError(`${callName} not included: ${result.status.type}`),
                  );
                }
              })
              .then((unsubscribe: () => void): void => {
                subscription.unsubscribe = unsubscribe;
              })
              .catch((error: unknown): void => {
                const errorMessage: string = error instanceof Error ? error.message : String(error);
                reject(new TradeSubmissionError(`${callName} submission failed: ${errorMessage}`));
              });
          },
        ),
        this.appConfigService.ledgerSubmitTimeoutMs,
        `${SUBTENSOR_PALLET}.${callName}`,
      );

      this.logger.log(`${callName} included txRef=${txRef}`);

      return { txRef };
    } finally {
      subscription.unsubscribe?.();
    }
  }

  private describeModuleError(
    api: ApiPromise,
    moduleError: Parameters<ApiPromise['registry']['findMetaError']>[0],
  ): string {
    try {
      const metaError = api.registry.findMetaError(moduleError);
      return `${metaError.section}.${metaError.name}`;
    } catch {
      return moduleError.toString();
    }
  }
}
