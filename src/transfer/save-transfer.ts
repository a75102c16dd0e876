/**
 * Moves raw save bytes between the device and the local machine.
 * Both calls block until the transfer finishes and throw TransferError on failure.
 */
export interface SaveTransfer {
    /** Copy the slot's save file from the device to `localPath`. */
    fetch(slot: number, localPath: string): void;
    /** Overwrite the slot's save file on the device with the bytes at `localPath`. */
    push(slot: number, localPath: string): void;
}
