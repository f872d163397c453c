/**
 * Progress event helpers for long-running operations.
 *
 * Provides a standard interface for reporting progress from batch operations.
 * Uses CustomEvent so the same payload can be dispatched on an EventTarget.
 *
 * @module
 */

/**
 * Progress payload containing a message and timestamp, plus item counts when
 * the operation knows them.
 */
export type Progress = {
	msg: string
	timestamp: number
	completed?: number
	total?: number
}

/** CustomEvent carrying progress details. */
export interface ProgressEvent extends CustomEvent<Progress> {}

/**
 * Create a Progress payload with current timestamp.
 * @param msg - The progress message.
 */
export function progress(
	msg: string,
	completed?: number,
	total?: number,
): Progress {
	return {
		msg,
		timestamp: Date.now(),
		completed,
		total,
	}
}

/**
 * Create a ProgressEvent with the given message.
 * @param msg - The progress message.
 */
export function progressEvent(
	msg: string,
	completed?: number,
	total?: number,
): ProgressEvent {
	return new CustomEvent("progress", {
		detail: progress(msg, completed, total),
	})
}

/**
 * Format the message of a progress event, appending `completed/total` when
 * both counts are present.
 */
export function progressEventMessage(event: ProgressEvent): string {
	const { msg, completed, total } = event.detail
	if (completed === undefined || total === undefined) return msg
	return `${msg} (${completed}/${total})`
}

/**
 * Log a progress event's message to the console.
 * @param progress - The progress event to log.
 */
export function logProgress(progress: ProgressEvent) {
	console.log(progressEventMessage(progress))
}
