/**
 * Dead-letter topics are derived from the source topic: `<topic>.DLT`.
 */
export const DEAD_LETTER_SUFFIX = ".DLT";

export function getDeadLetterTopic(sourceTopic: string): string {
	return `${sourceTopic}${DEAD_LETTER_SUFFIX}`;
}

export function isDeadLetterTopic(topic: string): boolean {
	return topic.endsWith(DEAD_LETTER_SUFFIX);
}
