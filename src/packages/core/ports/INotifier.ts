/**
 * INotifier - Passcode Delivery Port
 *
 * @module packages/core/ports/INotifier
 */

export interface INotifier {
  /**
   * Deliver a passcode to an email address.
   * Resolves false (or rejects) when delivery was not accepted by the provider.
   */
  sendPasscode(email: string, code: string): Promise<boolean>;
}
