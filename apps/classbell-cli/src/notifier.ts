import nodeNotifier from "node-notifier"

export interface Notification {
	title: string
	message: string
}

export interface Notifier {
	notify(notification: Notification): Promise<void>
}

/** Subset of node-notifier used by DesktopNotifier. */
export interface NotificationBackend {
	notify(
		options: { title: string; message: string; timeout: number },
		callback: (err: Error | null) => void,
	): unknown
}

export interface DesktopNotifierOptions {
	/** Seconds before the notification is dismissed. Default: 6. */
	timeoutSeconds?: number
	/** Optional backend for testing. */
	backend?: NotificationBackend
}

const DEFAULT_TIMEOUT_SECONDS = 6

/**
 * Shows desktop notifications through node-notifier.
 */
export class DesktopNotifier implements Notifier {
	private readonly backend: NotificationBackend
	private readonly timeoutSeconds: number

	constructor(options: DesktopNotifierOptions = {}) {
		this.backend = options.backend ?? nodeNotifier
		this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS
	}

	notify(notification: Notification): Promise<void> {
		return new Promise((resolve, reject) => {
			this.backend.notify(
				{
					title: notification.title,
					message: notification.message,
					timeout: this.timeoutSeconds,
				},
				(err) => {
					if (err) {
						reject(err)
					} else {
						resolve()
					}
				},
			)
		})
	}
}
