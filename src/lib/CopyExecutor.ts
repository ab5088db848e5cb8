/**
 * Copy executor implementation
 */

import * as fs from "fs";
import { CopyOutcome, ICopyExecutor } from "../interfaces/ICopyExecutor";
import { ErrorHandler } from "./ErrorHandler";

export class CopyExecutor implements ICopyExecutor {
  /**
   * Copy the source over the destination file
   *
   * Uses the platform copy primitive, so the destination either receives the
   * full contents or the call fails. The reported size is the size of the
   * source when the copy started; the destination is not inspected afterwards.
   */
  async copy(
    sourcePath: string,
    destinationFilePath: string
  ): Promise<CopyOutcome> {
    try {
      const stats = await fs.promises.stat(sourcePath);
      await fs.promises.copyFile(sourcePath, destinationFilePath);
      return { ok: true, bytesCopied: stats.size };
    } catch (error) {
      return {
        ok: false,
        errorKind: ErrorHandler.classifyCopyError(error),
        message: ErrorHandler.formatError(error),
        cause: error,
      };
    }
  }
}
