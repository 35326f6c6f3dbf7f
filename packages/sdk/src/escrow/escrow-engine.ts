/**
 * Escrow Engine
 *
 * Owns the requests and loans of one borrower for one (collateral, debt)
 * asset pair and moves the assets each lifecycle step requires.
 *
 * Every operation mutates a working copy of the state before issuing the
 * asset transfers it triggers, and the copy replaces the committed state
 * only once every transfer has gone through. Readers always see committed
 * state. A call made while another operation is in flight, such as one
 * from a transfer callback, fails with INVALID_STATE; callers serialize
 * through the registry.
 */

import {
	EscrowError,
	invalidState,
	policyViolation,
	unauthorized,
} from "../core/errors.js";
import {
	collateralFor,
	collateralReleased,
	interestFor,
} from "../core/fixed-point.js";
import {
	AssetId,
	EscrowId,
	Identity,
	LoanTerms,
	Seconds,
	Timestamp,
} from "../core/types.js";
import { AssetLedger, LedgerDirectory } from "../ledger/types.js";
import { LOAN_LIFECYCLE, REQUEST_LIFECYCLE } from "./escrow-state-machine.js";
import {
	EscrowEventKind,
	EscrowNotification,
	EscrowSnapshot,
	Loan,
	LoanAction,
	LoanRequest,
	LoanSlot,
	NotificationSink,
} from "./types.js";

export interface EscrowEngineOptions {
	/** Ledgers of the escrow's collateral and debt assets */
	ledgers: LedgerDirectory;
	/** Receives notifications of successful operations */
	notifications?: NotificationSink;
}

type Emit = (kind: EscrowEventKind, id: number) => void;

/**
 * @example
 * ```typescript
 * const escrow = EscrowEngine.create(
 *   { id: "escrow-1", owner: "alice", collateralAsset: "gohm", debtAsset: "dai" },
 *   { ledgers },
 * );
 * const requestId = await escrow.request("alice", {
 *   amount: 2500n * SCALE,
 *   interest: 2n * 10n ** 16n,
 *   loanToCollateral: 2500n * SCALE,
 *   duration: 365 * 24 * 60 * 60,
 * });
 * const loanId = await escrow.clear("bob", requestId, now);
 * ```
 */
export class EscrowEngine {
	private state: EscrowSnapshot;
	private busy = false;
	private readonly collateral: AssetLedger;
	private readonly debt: AssetLedger;

	constructor(
		snapshot: EscrowSnapshot,
		private readonly options: EscrowEngineOptions,
	) {
		this.state = structuredClone(snapshot);
		this.collateral = options.ledgers.ledgerFor(snapshot.collateralAsset);
		this.debt = options.ledgers.ledgerFor(snapshot.debtAsset);
	}

	/**
	 * Create an empty escrow.
	 */
	static create(
		params: Pick<
			EscrowSnapshot,
			"id" | "owner" | "collateralAsset" | "debtAsset"
		>,
		options: EscrowEngineOptions,
	): EscrowEngine {
		return new EscrowEngine({ ...params, requests: [], loans: [] }, options);
	}

	get id(): EscrowId {
		return this.state.id;
	}

	get owner(): Identity {
		return this.state.owner;
	}

	get collateralAsset(): AssetId {
		return this.state.collateralAsset;
	}

	get debtAsset(): AssetId {
		return this.state.debtAsset;
	}

	snapshot(): EscrowSnapshot {
		return structuredClone(this.state);
	}

	/**
	 * @throws EscrowError INVALID_STATE if the request does not exist
	 */
	getRequest(requestId: number): LoanRequest {
		return structuredClone(requestAt(this.state, requestId));
	}

	/**
	 * @throws EscrowError INVALID_STATE if the loan does not exist or is closed
	 */
	getLoan(loanId: number): Loan {
		const slot = this.loanSlot(loanId);
		if (!slot) {
			throw invalidState(`Loan ${loanId} does not exist`);
		}
		if (slot.status !== "open") {
			throw invalidState(`Loan ${loanId} is ${slot.status}`);
		}
		return slot.loan;
	}

	loanSlot(loanId: number): LoanSlot | undefined {
		const slot = Number.isInteger(loanId) ? this.state.loans[loanId] : undefined;
		return slot ? structuredClone(slot) : undefined;
	}

	/**
	 * Offer `terms` and lock the collateral they require.
	 *
	 * The collateral is pulled from `caller`, who must have approved this
	 * escrow on the collateral ledger. Refunds always go to the owner.
	 *
	 * @returns The new request id
	 */
	request(caller: Identity, terms: LoanTerms): Promise<number> {
		return this.run(async (state, emit) => {
			validateTerms(terms);
			const collateral = collateralFor(terms.amount, terms.loanToCollateral);
			const requestId =
				state.requests.push({
					amount: terms.amount,
					interest: terms.interest,
					loanToCollateral: terms.loanToCollateral,
					duration: terms.duration,
					status: REQUEST_LIFECYCLE.initialState,
				}) - 1;
			emit("requested", requestId);

			await this.collateral.transferFrom(state.id, caller, state.id, collateral);
			return requestId;
		});
	}

	/**
	 * Withdraw an active request and refund its collateral to the owner.
	 */
	rescind(caller: Identity, requestId: number): Promise<void> {
		return this.run(async (state, emit) => {
			if (caller !== state.owner) {
				throw unauthorized("Only the escrow owner can rescind a request");
			}
			const request = requestAt(state, requestId);
			request.status = REQUEST_LIFECYCLE.transition(
				request.status,
				"rescind",
				`request ${requestId}`,
			);
			emit("rescinded", requestId);

			await this.collateral.transfer(
				state.id,
				state.owner,
				collateralFor(request.amount, request.loanToCollateral),
			);
		});
	}

	/**
	 * Activate a request as `lender`.
	 *
	 * Performs no policy checks: lenders that want protocol bounds enforced
	 * go through the RiskGateway. The principal is pulled from `lender`, who
	 * must have approved this escrow on the debt ledger.
	 *
	 * @returns The new loan id
	 */
	clear(lender: Identity, requestId: number, now: Timestamp): Promise<number> {
		return this.run(async (state, emit) => {
			const request = requestAt(state, requestId);
			request.status = REQUEST_LIFECYCLE.transition(
				request.status,
				"clear",
				`request ${requestId}`,
			);

			const terms: LoanTerms = {
				amount: request.amount,
				interest: request.interest,
				loanToCollateral: request.loanToCollateral,
				duration: request.duration,
			};
			const loan: Loan = {
				request: terms,
				amount:
					terms.amount + interestFor(terms.amount, terms.interest, terms.duration),
				collateral: collateralFor(terms.amount, terms.loanToCollateral),
				expiry: expiryAfter(now, terms.duration),
				rollable: true,
				lender,
			};
			const loanId = state.loans.push({ status: "open", loan }) - 1;
			emit("cleared", requestId);

			await this.debt.transferFrom(state.id, lender, state.owner, terms.amount);
			return loanId;
		});
	}

	/**
	 * Pay back `repaid` of a loan's outstanding amount.
	 *
	 * Releases collateral in proportion to the repayment. Repaying the full
	 * amount closes the loan.
	 *
	 * @returns Collateral released to the owner
	 */
	repay(
		caller: Identity,
		loanId: number,
		repaid: bigint,
		now: Timestamp,
	): Promise<bigint> {
		return this.run(async (state, emit) => {
			const loan = openLoanAt(state, loanId, "repay");
			assertCurrent(loan, loanId, now);
			if (repaid < 0n) {
				throw policyViolation("NEGATIVE_AMOUNT", "Repayment must not be negative");
			}
			if (repaid > loan.amount) {
				throw policyViolation(
					"OVER_REPAYMENT",
					`Repayment ${repaid} exceeds outstanding ${loan.amount}`,
				);
			}

			const released = collateralReleased(loan.collateral, repaid, loan.amount);
			const lender = loan.lender;
			if (repaid === loan.amount) {
				closeLoan(state, loanId, "repay-in-full");
			} else {
				loan.amount -= repaid;
				loan.collateral -= released;
			}
			emit("repaid", loanId);

			await this.debt.transferFrom(state.id, caller, lender, repaid);
			await this.collateral.transfer(state.id, state.owner, released);
			return released;
		});
	}

	/**
	 * Extend a loan by one more term.
	 *
	 * Interest for another term is added to the outstanding amount, expiry
	 * moves out by the original duration, and `caller` tops the collateral up
	 * to what the current amount requires at the original ratio.
	 *
	 * @returns The loan after rolling
	 */
	roll(caller: Identity, loanId: number, now: Timestamp): Promise<Loan> {
		return this.run(async (state, emit) => {
			const loan = openLoanAt(state, loanId, "roll");
			assertCurrent(loan, loanId, now);
			if (!loan.rollable) {
				throw new EscrowError(
					`Loan ${loanId} is not rollable`,
					"NOT_ROLLABLE",
				);
			}

			const terms = loan.request;
			const required = collateralFor(loan.amount, terms.loanToCollateral);
			// repayment rounding can leave slightly more collateral than required
			const topUp = required > loan.collateral ? required - loan.collateral : 0n;
			const interest = interestFor(loan.amount, terms.interest, terms.duration);

			loan.amount += interest;
			loan.collateral += topUp;
			loan.expiry = expiryAfter(loan.expiry, terms.duration);
			emit("rolled", loanId);

			await this.collateral.transferFrom(state.id, caller, state.id, topUp);
			return structuredClone(loan);
		});
	}

	/**
	 * Enable or disable rolling of a loan. Lender only.
	 *
	 * @returns The new value
	 */
	toggleRoll(caller: Identity, loanId: number): Promise<boolean> {
		return this.run(async (state) => {
			const loan = openLoanAt(state, loanId, "toggle-roll");
			if (caller !== loan.lender) {
				throw unauthorized("Only the lender can toggle rollover");
			}
			loan.rollable = !loan.rollable;
			return loan.rollable;
		});
	}

	/**
	 * Seize the collateral of an expired loan for its lender.
	 *
	 * Anyone may trigger this; the collateral always goes to the recorded
	 * lender.
	 *
	 * @returns Collateral transferred to the lender
	 */
	defaulted(loanId: number, now: Timestamp): Promise<bigint> {
		return this.run(async (state, emit) => {
			const loan = openLoanAt(state, loanId, "claim-default");
			if (now <= loan.expiry) {
				throw new EscrowError(
					`Loan ${loanId} is not in default until after ${loan.expiry}`,
					"NO_DEFAULT",
				);
			}
			const { lender, collateral } = loan;
			closeLoan(state, loanId, "claim-default");
			emit("defaulted", loanId);

			await this.collateral.transfer(state.id, lender, collateral);
			return collateral;
		});
	}

	/**
	 * Approve `to` to take over a loan as its lender. Lender only.
	 */
	approveTransfer(caller: Identity, loanId: number, to: Identity): Promise<void> {
		return this.run(async (state) => {
			const loan = openLoanAt(state, loanId, "approve-transfer");
			if (caller !== loan.lender) {
				throw unauthorized("Only the lender can approve a transfer");
			}
			loan.pendingLender = to;
		});
	}

	/**
	 * Become the lender of a loan the current lender approved `caller` for.
	 */
	transferOwnership(caller: Identity, loanId: number): Promise<void> {
		return this.run(async (state) => {
			const loan = openLoanAt(state, loanId, "transfer");
			if (loan.pendingLender === undefined || caller !== loan.pendingLender) {
				throw unauthorized(`${caller} is not approved to take over loan ${loanId}`);
			}
			loan.lender = caller;
			delete loan.pendingLender;
		});
	}

	/**
	 * Run one operation against a working copy of the state.
	 *
	 * The copy is committed and notifications go out only once the
	 * operation has succeeded.
	 */
	private async run<T>(
		operation: (state: EscrowSnapshot, emit: Emit) => Promise<T>,
	): Promise<T> {
		if (this.busy) {
			throw invalidState(`Escrow ${this.state.id} is busy with another operation`);
		}
		this.busy = true;
		try {
			const working = structuredClone(this.state);
			const pending: EscrowNotification[] = [];
			const emit: Emit = (kind, id) =>
				pending.push({ escrowId: working.id, kind, id });

			const value = await operation(working, emit);
			this.state = working;
			for (const notification of pending) {
				this.options.notifications?.notify(notification);
			}
			return value;
		} finally {
			this.busy = false;
		}
	}
}

function requestAt(state: EscrowSnapshot, requestId: number): LoanRequest {
	const request = Number.isInteger(requestId)
		? state.requests[requestId]
		: undefined;
	if (!request) {
		throw invalidState(`Request ${requestId} does not exist`);
	}
	return request;
}

function openLoanAt(
	state: EscrowSnapshot,
	loanId: number,
	action: LoanAction,
): Loan {
	const slot = Number.isInteger(loanId) ? state.loans[loanId] : undefined;
	if (!slot) {
		throw invalidState(`Loan ${loanId} does not exist`);
	}
	LOAN_LIFECYCLE.transition(slot.status, action, `loan ${loanId}`);
	if (slot.status !== "open") {
		throw invalidState(`Loan ${loanId} is ${slot.status}`);
	}
	return slot.loan;
}

function closeLoan(
	state: EscrowSnapshot,
	loanId: number,
	action: "repay-in-full" | "claim-default",
): void {
	const next = LOAN_LIFECYCLE.transition("open", action, `loan ${loanId}`);
	if (next === "open") {
		throw invalidState(`Loan ${loanId} did not close on ${action}`);
	}
	state.loans[loanId] = { status: next };
}

function assertCurrent(loan: Loan, loanId: number, now: Timestamp): void {
	if (now > loan.expiry) {
		throw new EscrowError(
			`Loan ${loanId} defaulted at ${loan.expiry}`,
			"DEFAULT",
		);
	}
}

function expiryAfter(from: Timestamp, duration: Seconds): Timestamp {
	const expiry = from + duration;
	if (!Number.isSafeInteger(expiry)) {
		throw policyViolation(
			"EXPIRY_OUT_OF_RANGE",
			`Expiry ${from} + ${duration} is out of range`,
		);
	}
	return expiry;
}

function validateTerms(terms: LoanTerms): void {
	if (terms.amount < 0n || terms.interest < 0n) {
		throw policyViolation(
			"NEGATIVE_AMOUNT",
			"Amount and interest must not be negative",
		);
	}
	if (terms.loanToCollateral <= 0n) {
		throw policyViolation(
			"ZERO_LOAN_TO_COLLATERAL",
			"Loan-to-collateral must be greater than zero",
		);
	}
	if (!Number.isSafeInteger(terms.duration) || terms.duration < 0) {
		throw policyViolation(
			"INVALID_DURATION",
			`Duration ${terms.duration} is not a whole number of seconds`,
		);
	}
}
