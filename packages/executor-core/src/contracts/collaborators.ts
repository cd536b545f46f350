/**
 * Content of one desktop notification.
 */
export interface DesktopNotification {
  /** Notification headline. */
  readonly title: string
  /** Notification text. */
  readonly body: string
}

/**
 * Capability for showing native OS notifications.
 */
export interface DesktopNotifier {
  /**
   * Displays a notification without waiting for the user.
   *
   * @param notification Title and body.
   */
  notify(notification: DesktopNotification): void
}

/**
 * Capability for blocking-style HTTP GET requests.
 */
export interface HttpClient {
  /**
   * Performs a GET request and discards the body.
   *
   * @param url Absolute request URL.
   * @param headers Request headers.
   * @throws Error for network failures and non-2xx responses.
   */
  get(url: string, headers: Readonly<Record<string, string>>): Promise<void>
}
