/**
 * Status messages emitted while a batch is decoded and converted.
 *
 * Messages travel as `CustomEvent`s named "progress", so a caller can pass
 * them straight to an `EventTarget` or collect them in a test.
 *
 * @module
 */

export type Progress = {
	msg: string
	/** Milliseconds since the epoch, taken when the message was created. */
	timestamp: number
}

export interface ProgressEvent extends CustomEvent<Progress> {}

/** Stamp a status message with the current time. */
export function progress(msg: string): Progress {
	return {
		msg,
		timestamp: Date.now(),
	}
}

/** Wrap a status message in a "progress" event. */
export function progressEvent(msg: string): ProgressEvent {
	return new CustomEvent("progress", { detail: progress(msg) })
}

export function progressEventMessage(event: ProgressEvent): string {
	return event.detail.msg
}

/**
 * Default `onProgress` handler for the conversion entry points: prints each
 * message on its own line.
 */
export function logProgress(progress: ProgressEvent) {
	console.log(progressEventMessage(progress))
}
