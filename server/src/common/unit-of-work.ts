import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { DataSource, type EntityManager } from "typeorm";
import { nanoid } from "nanoid";
import {
	type EscrowNotification,
	EscrowRegistry,
	Mutex,
	type Timestamp,
} from "@pairloan/sdk";
import { TypeOrmLedgerDirectory } from "../ledger/typeorm-asset-ledger";
import { TypeOrmEscrowStore } from "../escrows/typeorm-escrow-store";
import { CLOCK, type Clock } from "./clock";
import { type EscrowEvent, escrowEventId } from "./escrow.event";

export interface UnitOfWorkContext {
	manager: EntityManager;
	ledgers: TypeOrmLedgerDirectory;
	store: TypeOrmEscrowStore;
	registry: EscrowRegistry;
	/** Current time in seconds, read once per unit */
	now: Timestamp;
}

/**
 * Runs protocol operations one at a time, each inside a database
 * transaction. Ledger and escrow changes commit together; escrow
 * notifications are emitted after commit.
 */
@Injectable()
export class UnitOfWork {
	private readonly logger = new Logger(UnitOfWork.name);
	private readonly mutex = new Mutex();
	private readonly assets: string[];

	constructor(
		private readonly dataSource: DataSource,
		private readonly events: EventEmitter2,
		@Inject(CLOCK) private readonly clock: Clock,
		config: ConfigService,
	) {
		this.assets = [
			config.getOrThrow<string>("COLLATERAL_ASSET"),
			config.getOrThrow<string>("DEBT_ASSET"),
		];
	}

	run<T>(fn: (ctx: UnitOfWorkContext) => Promise<T>): Promise<T> {
		return this.mutex.runExclusive(async () => {
			const outbox: EscrowNotification[] = [];
			const result = await this.dataSource.transaction(async (manager) => {
				const ledgers = new TypeOrmLedgerDirectory(manager, this.assets);
				const store = new TypeOrmEscrowStore(manager);
				const registry = new EscrowRegistry({
					store,
					ledgers,
					notifications: { notify: (n) => outbox.push(n) },
				});
				return fn({ manager, ledgers, store, registry, now: this.clock.now() });
			});

			for (const notification of outbox) {
				const event: EscrowEvent = {
					eventId: nanoid(16),
					escrowId: notification.escrowId,
					kind: notification.kind,
					id: notification.id,
					emittedAt: new Date().toISOString(),
				};
				this.logger.debug(`${event.kind} ${event.escrowId}/${event.id}`);
				this.events.emit(escrowEventId(notification.kind), event);
			}
			return result;
		});
	}
}
