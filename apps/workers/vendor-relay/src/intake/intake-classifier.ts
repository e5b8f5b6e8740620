import type { StreamRecord } from "@relay/core-kafka";
import {
	type EventAction,
	type EventKind,
	type ObjectType,
	parseEventAction,
	parseObjectType,
	resolveEventKind,
} from "./event-kind.js";

export const OBJECT_TYPE_HEADER = "objectType";
export const ACTION_HEADER = "action";

/** Column width of outbound_event.payload */
export const MAX_PAYLOAD_BYTES = 2048;

/** Column width of outbound_event.routing_key and relay_record.external_id */
export const MAX_ROUTING_KEY_LENGTH = 255;

export type JsonDocument = Record<string, unknown> | unknown[];

export interface ClassifiedEvent {
	routingKey: string;
	kind: EventKind;
	objectType: ObjectType;
	action: EventAction;
	payload: JsonDocument;
	/** Canonical serialised payload; this is what gets stored and sent */
	body: string;
}

export type Classification =
	| { type: "routable"; event: ClassifiedEvent }
	| {
			type: "unroutable";
			objectType: ObjectType | undefined;
			action: EventAction | undefined;
	  }
	| { type: "malformed"; reason: string };

function parseDocument(
	value: string,
): { ok: true; document: JsonDocument } | { ok: false; reason: string } {
	let parsed: unknown;
	try {
		parsed = JSON.parse(value);
	} catch (error) {
		return {
			ok: false,
			reason: error instanceof Error ? error.message : String(error),
		};
	}
	if (typeof parsed !== "object" || parsed === null) {
		return { ok: false, reason: "Payload is not a JSON object or array" };
	}
	if (Array.isArray(parsed)) {
		return { ok: true, document: parsed };
	}
	return { ok: true, document: { ...parsed } };
}

/**
 * Decides what to do with one raw record. The payload is validated before
 * the headers are looked at, so a broken payload is dead-lettered whatever
 * its headers say.
 */
export function classifyRecord(record: StreamRecord): Classification {
	if (record.value === null || record.value.trim() === "") {
		return { type: "malformed", reason: "Payload is empty" };
	}

	const parsed = parseDocument(record.value);
	if (!parsed.ok) {
		return { type: "malformed", reason: parsed.reason };
	}

	const body = JSON.stringify(parsed.document);
	const size = Buffer.byteLength(body, "utf8");
	if (size > MAX_PAYLOAD_BYTES) {
		return {
			type: "malformed",
			reason: `Payload is ${size} bytes, limit is ${MAX_PAYLOAD_BYTES}`,
		};
	}

	const objectType = parseObjectType(record.headers[OBJECT_TYPE_HEADER]);
	const action = parseEventAction(record.headers[ACTION_HEADER]);
	const kind = resolveEventKind(objectType, action);
	if (!kind || !objectType || !action) {
		return { type: "unroutable", objectType, action };
	}

	if (record.key === null || record.key === "") {
		return { type: "malformed", reason: "Record has no routing key" };
	}
	const keyLength = [...record.key].length;
	if (keyLength > MAX_ROUTING_KEY_LENGTH) {
		return {
			type: "malformed",
			reason: `Routing key is ${keyLength} characters, limit is ${MAX_ROUTING_KEY_LENGTH}`,
		};
	}

	return {
		type: "routable",
		event: {
			routingKey: record.key,
			kind,
			objectType,
			action,
			payload: parsed.document,
			body,
		},
	};
}
