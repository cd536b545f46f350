import notifier from 'node-notifier'

import type { DesktopNotification, DesktopNotifier } from '../contracts/collaborators.js'
import type { Logger } from '../logging/logger.js'

/**
 * Creates the default desktop notifier backed by node-notifier.
 *
 * Delivery errors are logged and otherwise ignored.
 *
 * @param logger Diagnostics logger.
 * @returns Desktop notifier implementation.
 */
export const createNodeDesktopNotifier = (logger: Logger): DesktopNotifier => {
  return {
    notify: (notification: DesktopNotification): void => {
      notifier.notify(
        {
          title: notification.title,
          message: notification.body,
        },
        (error: Error | null) => {
          if (error) {
            logger.warn({ err: error, title: notification.title }, 'desktop notification failed')
          }
        }
      )
    },
  }
}
