import { LOAN_LIFECYCLE, REQUEST_LIFECYCLE } from "../escrow/escrow-state-machine";
import { LifecycleMachine, createState, createTransition } from "./state-machine";

describe("LifecycleMachine", () => {
	type DoorState = "open" | "closed";
	type DoorAction = "open" | "close";

	const door = new LifecycleMachine<DoorState, DoorAction>({
		initialState: "open",
		states: [
			createState("open", ["close"]),
			createState("closed", ["open"], { description: "Shut" }),
		],
		transitions: [
			createTransition("open", "close", "closed"),
			createTransition("closed", "open", "open"),
		],
	});

	it("resolves allowed transitions", () => {
		expect(door.initialState).toBe("open");
		expect(door.transition("open", "close", "door 1")).toBe("closed");
	});

	it("rejects actions the state does not allow", () => {
		expect(door.canPerform("open", "open")).toBe(false);
		expect(() => door.transition("open", "open", "door 1")).toThrow(
			"Cannot open door 1: it is open",
		);
	});

	it("accepts transitions from several states", () => {
		const machine = new LifecycleMachine<DoorState, DoorAction>({
			initialState: "open",
			states: [createState("open", ["close"]), createState("closed", ["close"])],
			transitions: [createTransition(["open", "closed"], "close", "closed")],
		});
		expect(machine.transition("closed", "close", "door 2")).toBe("closed");
	});
});

describe("REQUEST_LIFECYCLE", () => {
	it("starts active", () => {
		expect(REQUEST_LIFECYCLE.initialState).toBe("active");
	});

	it("leaves active exactly once", () => {
		expect(REQUEST_LIFECYCLE.transition("active", "rescind", "request 0")).toBe(
			"rescinded",
		);
		expect(REQUEST_LIFECYCLE.transition("active", "clear", "request 0")).toBe(
			"cleared",
		);
		expect(() =>
			REQUEST_LIFECYCLE.transition("cleared", "rescind", "request 0"),
		).toThrow(
			expect.objectContaining({
				code: "INVALID_STATE",
				message: "Cannot rescind request 0: it is cleared",
			}),
		);
		expect(REQUEST_LIFECYCLE.isFinal("rescinded")).toBe(true);
	});
});

describe("LOAN_LIFECYCLE", () => {
	it("keeps open loans open until repaid in full or defaulted", () => {
		expect(LOAN_LIFECYCLE.transition("open", "roll", "loan 0")).toBe("open");
		expect(LOAN_LIFECYCLE.transition("open", "repay-in-full", "loan 0")).toBe(
			"repaid",
		);
		expect(LOAN_LIFECYCLE.transition("open", "claim-default", "loan 0")).toBe(
			"defaulted",
		);
	});

	it("allows nothing on a tombstone", () => {
		expect(LOAN_LIFECYCLE.getAllowedActions("repaid")).toEqual([]);
		expect(LOAN_LIFECYCLE.canPerform("defaulted", "repay")).toBe(false);
		expect(LOAN_LIFECYCLE.isFinal("defaulted")).toBe(true);
	});
});
