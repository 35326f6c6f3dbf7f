import { LoanDto, LoanRequestDto } from "./escrow.dto";
import { RepayInDto } from "./loan-terms.dto";

const apiProperty = (target: object, property: string): unknown =>
	Reflect.getMetadata("swagger/apiModelProperties", target, property);

describe("escrow DTO schema", () => {
	it("should document every request status", () => {
		expect(apiProperty(LoanRequestDto.prototype, "status")).toMatchObject({
			enum: ["active", "rescinded", "cleared"],
		});
	});

	it("should document every loan status", () => {
		expect(apiProperty(LoanDto.prototype, "status")).toMatchObject({
			enum: ["open", "repaid", "defaulted"],
		});
	});

	it("should describe repayment as bounded by the outstanding amount", () => {
		expect(apiProperty(RepayInDto.prototype, "amount")).toMatchObject({
			description: "Debt to repay; must not exceed the outstanding amount",
		});
	});
});
