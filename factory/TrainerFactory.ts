/**
 * Trainer Factory
 * Creates a configured CollaborativeTrainerService with its ledger, engine and adapters
 */

import { SampleCodec } from '../ContributionCommitment';
import { CollaborativeTrainerService } from '../CollaborativeTrainerService';
import { ContributionLedgerService } from '../ContributionLedgerService';
import { IncentiveConfig } from '../IncentiveConfig';
import { IncentiveEngine } from '../IncentiveEngine';
import { CostCurve, RewardSplit } from '../IncentivePolicies';
import { InvariantChecker } from '../InvariantChecker';
import { InMemoryEventStore } from '../adapters/events/InMemoryEventStore';
import { InMemoryContributionStore } from '../adapters/storage/InMemoryContributionStore';
import { InMemoryValueTransfer } from '../adapters/transfer/InMemoryValueTransfer';
import { IClassifier } from '../interfaces/IClassifier';
import { IContributionStore } from '../interfaces/IContributionStore';
import { IEventStore } from '../interfaces/IEventStore';
import { IValueTransfer } from '../interfaces/IValueTransfer';
import { Address, Timestamp } from '../types';
import { ConsoleLogger, ILogger } from '../utils/ILogger';

export interface TrainerOptions<TSample> {
    config: IncentiveConfig;
    /** Identity the trainer uses towards the ledger and engine */
    orchestratorAddress: Address;
    classifier: IClassifier<TSample>;
    codec: SampleCodec<TSample>;
    deployedAt: Timestamp;
    logger?: ILogger;
    store?: IContributionStore;
    eventStore?: IEventStore;
    valueTransfer?: IValueTransfer;
    costCurve?: CostCurve<TSample>;
    rewardSplit?: RewardSplit;
}

export interface TrainerBundle<TSample> {
    trainer: CollaborativeTrainerService<TSample>;
    ledger: ContributionLedgerService;
    engine: IncentiveEngine<TSample>;
    eventStore: IEventStore;
    valueTransfer: IValueTransfer;
    invariantChecker: InvariantChecker;
}

export class TrainerFactory {
    /**
     * Wire a trainer; adapters not supplied default to the in-memory ones
     */
    static create<TSample>(options: TrainerOptions<TSample>): TrainerBundle<TSample> {
        const logger = options.logger ?? new ConsoleLogger('StakeLedger');
        const invariantChecker = new InvariantChecker(logger);
        const eventStore = options.eventStore ?? new InMemoryEventStore();
        const valueTransfer = options.valueTransfer ?? new InMemoryValueTransfer();

        const ledger = new ContributionLedgerService(logger, options.orchestratorAddress, {
            store: options.store ?? new InMemoryContributionStore(),
            invariantChecker,
        });
        const engine = new IncentiveEngine<TSample>(logger, {
            orchestrator: options.orchestratorAddress,
            owner: options.config.ownerAddress,
            costWeight: options.config.costWeight,
            timings: options.config.timings,
            deployedAt: options.deployedAt,
            costCurve: options.costCurve,
            rewardSplit: options.rewardSplit,
        });
        const trainer = new CollaborativeTrainerService<TSample>(logger, options.orchestratorAddress, {
            ledger,
            engine,
            classifier: options.classifier,
            codec: options.codec,
            eventStore,
            valueTransfer,
            invariantChecker,
        });

        return { trainer, ledger, engine, eventStore, valueTransfer, invariantChecker };
    }
}
