/**
 * PMD Transport Interface
 * Boundary to an already-connected link; discovery and pairing live elsewhere
 */

// ─────────────────────────────────────────────────────────────────────────────
// Notification sources
// ─────────────────────────────────────────────────────────────────────────────

export type NotificationSource = 'pmdControl' | 'pmdData' | 'heartRate' | 'battery';

export interface PmdNotification {
  source: NotificationSource;
  data: Uint8Array;
}

// Characteristics the facade may read directly (device information, body location)
export type ReadableCharacteristic =
  | 'modelNumber'
  | 'manufacturerName'
  | 'hardwareRevision'
  | 'firmwareRevision'
  | 'softwareRevision'
  | 'serialNumber'
  | 'systemId'
  | 'bodySensorLocation';

// ─────────────────────────────────────────────────────────────────────────────
// Transport Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface PmdTransport {
  /**
   * Write a command to the PMD control point.
   * Rejects with TransportError when the link refuses the write.
   */
  write(data: Uint8Array): Promise<void>;

  /**
   * Single-consumer sequence of every notification, in arrival order.
   * Ends when the link is lost; cannot be restarted.
   */
  notifications(): AsyncIterable<PmdNotification>;

  isConnected(): boolean;
  disconnect(): Promise<void>;

  // Enable or disable notifications/indications for a source
  setNotify(source: NotificationSource, enabled: boolean): Promise<void>;

  read?(characteristic: ReadableCharacteristic): Promise<Uint8Array>;
}
