export const OBJECT_TYPES = ["TEAM", "MEMBER"] as const;
export type ObjectType = (typeof OBJECT_TYPES)[number];

export const EVENT_ACTIONS = ["CREATE", "UPDATE", "END"] as const;
export type EventAction = (typeof EVENT_ACTIONS)[number];

export type EventKind = `${ObjectType}_${EventAction}`;

function matchIgnoreCase<T extends string>(
	values: readonly T[],
	raw: string | null | undefined,
): T | undefined {
	if (raw === null || raw === undefined) {
		return undefined;
	}
	const upper = raw.trim().toUpperCase();
	return values.find((value) => value === upper);
}

export function parseObjectType(
	raw: string | null | undefined,
): ObjectType | undefined {
	return matchIgnoreCase(OBJECT_TYPES, raw);
}

export function parseEventAction(
	raw: string | null | undefined,
): EventAction | undefined {
	return matchIgnoreCase(EVENT_ACTIONS, raw);
}

const EVENT_KINDS: Record<ObjectType, Record<EventAction, EventKind>> = {
	TEAM: { CREATE: "TEAM_CREATE", UPDATE: "TEAM_UPDATE", END: "TEAM_END" },
	MEMBER: {
		CREATE: "MEMBER_CREATE",
		UPDATE: "MEMBER_UPDATE",
		END: "MEMBER_END",
	},
};

export function resolveEventKind(
	objectType: ObjectType | undefined,
	action: EventAction | undefined,
): EventKind | undefined {
	if (!objectType || !action) {
		return undefined;
	}
	return EVENT_KINDS[objectType][action];
}

/**
 * END events remove the local record; CREATE and UPDATE upsert it
 */
export function isRemoval(action: EventAction): boolean {
	return action === "END";
}
