import {
	SCALE,
	SECONDS_PER_YEAR,
	collateralFor,
	collateralReleased,
	interestFor,
} from "./fixed-point";

describe("fixed-point", () => {
	const YEAR = 365 * 24 * 60 * 60;

	describe("collateralFor", () => {
		it("derives one unit of collateral at a 2500 ratio", () => {
			expect(collateralFor(2500n * SCALE, 2500n * SCALE)).toBe(SCALE);
		});

		it("truncates toward zero", () => {
			expect(collateralFor(10n, 3n * SCALE)).toBe(3n);
		});

		it("rejects a zero ratio", () => {
			expect(() => collateralFor(SCALE, 0n)).toThrow(
				expect.objectContaining({
					code: "POLICY_VIOLATION",
					reason: "ZERO_LOAN_TO_COLLATERAL",
				}),
			);
		});
	});

	describe("interestFor", () => {
		it("charges the annual rate over a full year", () => {
			expect(interestFor(2500n * SCALE, 2n * 10n ** 16n, YEAR)).toBe(
				50n * SCALE,
			);
		});

		it("scales the rate by the duration before applying it", () => {
			// rate * duration / year truncates to zero before the amount is applied
			expect(interestFor(SECONDS_PER_YEAR * SCALE, 1n, 1)).toBe(0n);
		});

		it("truncates the final division", () => {
			expect(interestFor(3n, SCALE, YEAR / 2)).toBe(1n);
		});
	});

	describe("collateralReleased", () => {
		it("releases collateral in proportion to the repayment", () => {
			expect(collateralReleased(SCALE, 1275n * SCALE, 2550n * SCALE)).toBe(
				SCALE / 2n,
			);
		});

		it("releases everything on a full repayment", () => {
			expect(collateralReleased(7n, 3n, 3n)).toBe(7n);
		});

		it("truncates partial releases", () => {
			expect(collateralReleased(10n, 1n, 3n)).toBe(3n);
		});
	});
});
