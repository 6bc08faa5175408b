/**
 * Fax gateway used when a payer cannot take prior authorization
 * electronically.
 */

import * as fs from "node:fs";
import * as path from "node:path";

export interface FaxRequest {
  /** Destination fax number */
  to: string;

  /** Rendered PDF to send */
  filePath: string;

  /** Our reference for the transmission (PA request id) */
  reference: string;
}

export interface FaxReceipt {
  faxId: string;
}

export interface FaxGateway {
  send(request: FaxRequest): Promise<FaxReceipt>;
}

/**
 * Queues faxes as files in an outbox directory for the practice's fax
 * server to pick up. Each transmission gets a JSON manifest next to the PDF.
 */
export class OutboxFaxGateway implements FaxGateway {
  private sequence = 0;

  constructor(
    private outboxDir: string,
    private now: () => Date = () => new Date()
  ) {}

  async send(request: FaxRequest): Promise<FaxReceipt> {
    if (!fs.existsSync(request.filePath)) {
      throw new Error(`Fax document not found: ${request.filePath}`);
    }

    fs.mkdirSync(this.outboxDir, { recursive: true });
    const faxId = `FAX-${request.reference}-${++this.sequence}`;
    const manifest = {
      faxId,
      to: request.to,
      document: path.resolve(request.filePath),
      reference: request.reference,
      queuedAt: this.now().toISOString(),
    };

    await fs.promises.writeFile(
      path.join(this.outboxDir, `${faxId}.json`),
      JSON.stringify(manifest, null, 2),
      "utf-8"
    );
    console.log(`[fax] Queued ${faxId} to ${request.to}`);
    return { faxId };
  }
}
