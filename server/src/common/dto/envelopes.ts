import {
	ApiProperty,
	ApiPropertyOptional,
	getSchemaPath,
} from "@nestjs/swagger";

export type ApiPaginatedMeta = {
	total: number;
	nextOffset?: number;
};

export type ApiPaginatedEnvelope<T> = {
	data: T;
	meta: ApiPaginatedMeta;
};

export type ApiEnvelope<T> = {
	data: T;
};

export const envelope = <T>(data: T): ApiEnvelope<T> => ({ data });

export const paginatedEnvelope = <T>(
	data: T,
	meta: ApiPaginatedMeta,
): ApiPaginatedEnvelope<T> => ({
	data,
	meta,
});

export class ApiPaginatedMetaDto implements ApiPaginatedMeta {
	@ApiProperty({
		description: "Total number of items across all pages (for this query).",
		example: 42,
	})
	total!: number;

	@ApiPropertyOptional({
		description: "Offset of the next page. Omitted when there is no next page.",
		example: 20,
	})
	nextOffset?: number;
}

/** Placeholder “envelope” shell; `data` is overridden per-endpoint in controller schemas. */
export class ApiEnvelopeShellDto<T> {
	@ApiProperty({
		description: "Payload for this endpoint (shape varies by route)",
	})
	data!: T;
}

export function getSchemaPathForDto(dto: Parameters<typeof getSchemaPath>[0]) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: { $ref: getSchemaPath(dto) },
				},
				required: ["data"],
			},
		],
	};
}

export function getSchemaPathForPaginatedDto(
	dto: Parameters<typeof getSchemaPath>[0],
) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: {
						type: "array",
						items: { $ref: getSchemaPath(dto) },
					},
					meta: { $ref: getSchemaPath(ApiPaginatedMetaDto) },
				},
				required: ["data", "meta"],
			},
		],
	};
}
