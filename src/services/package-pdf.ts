/**
 * Package PDF Renderer
 *
 * Renders a documentation package as a fax-ready prior authorization
 * request: cover sheet, medical necessity rationale, then each attached
 * document's text.
 */

import PDFDocument from "pdfkit";
import * as fs from "node:fs";
import * as path from "node:path";
import type { DocumentationPackage, ClinicalDocument } from "../types/documentation.js";
import type { Patient } from "../types/patient.js";
import type { Provider } from "../types/provider.js";
import type { Payer } from "../types/payer.js";
import { DOCUMENT_KIND_LABELS } from "../types/authorization.js";

/**
 * Format a date as YYYYMMDD
 */
function formatDateForFilename(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}${month}${day}`;
}

/**
 * Format a date for display (e.g., "1 July 2025")
 */
function formatDateForDisplay(date: Date): string {
  const months = [
    "January", "February", "March", "April", "May", "June",
    "July", "August", "September", "October", "November", "December",
  ];
  return `${date.getDate()} ${months[date.getMonth()]} ${date.getFullYear()}`;
}

export interface PackagePdfInput {
  documentationPackage: DocumentationPackage;
  documents: ClinicalDocument[];
  patient: Patient;
  provider: Provider;
  payer: Payer;
  memberId: string;
  generatedAt: Date;
}

export interface RenderedPdf {
  filePath: string;
  fileName: string;
}

/**
 * Render the package into `outDir`.
 */
export async function renderPackagePdf(input: PackagePdfInput, outDir: string): Promise<RenderedPdf> {
  fs.mkdirSync(outDir, { recursive: true });

  const pkg = input.documentationPackage;
  const fileName = `${formatDateForFilename(input.generatedAt)}_PA_${pkg.paRequestId}.pdf`;
  const filePath = path.join(outDir, fileName);
  const byId = new Map(input.documents.map((d) => [d.id, d]));

  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: "LETTER",
      margins: { top: 72, bottom: 72, left: 72, right: 72 },
    });

    const stream = fs.createWriteStream(filePath);
    doc.pipe(stream);

    // Cover sheet
    doc.fontSize(18).font("Helvetica-Bold").text("Prior Authorization Request", { align: "center" });
    doc.moveDown(0.5);
    doc
      .fontSize(12)
      .font("Helvetica")
      .text(`To: ${input.payer.name}${input.payer.access.faxNumber ? ` (fax ${input.payer.access.faxNumber})` : ""}`, {
        align: "center",
      });
    doc.moveDown(2);

    doc.fontSize(11).font("Helvetica-Bold").text("Patient Information");
    doc.moveDown(0.3);
    doc.fontSize(10).font("Helvetica");
    doc.text(`Patient: ${input.patient.fullName}`);
    doc.text(`Date of Birth: ${input.patient.dateOfBirth}`);
    doc.text(`Member ID: ${input.memberId}`);
    doc.moveDown(1.5);

    doc.fontSize(11).font("Helvetica-Bold").text("Requested Service");
    doc.moveDown(0.3);
    doc.fontSize(10).font("Helvetica");
    doc.text(`Service: ${pkg.serviceCode}`);
    doc.text(`Rendering Provider: ${input.provider.name}${input.provider.npi ? ` (NPI ${input.provider.npi})` : ""}`);
    doc.text(`Request Reference: ${pkg.paRequestId}`);
    doc.moveDown(1.5);

    doc.fontSize(11).font("Helvetica-Bold").text("Medical Necessity");
    doc.moveDown(0.5);
    doc.fontSize(10).font("Helvetica").text(pkg.rationale, { align: "left", lineGap: 4 });
    doc.moveDown(1.5);

    doc.fontSize(11).font("Helvetica-Bold").text("Enclosed Documents");
    doc.moveDown(0.3);
    doc.fontSize(10).font("Helvetica");
    for (const attached of pkg.attachedDocuments) {
      doc.text(`- ${DOCUMENT_KIND_LABELS[attached.kind]}: ${attached.title}`);
    }

    for (const attached of pkg.attachedDocuments) {
      const source = byId.get(attached.documentId);
      if (!source) continue;

      doc.addPage();
      doc.fontSize(14).font("Helvetica-Bold").text(DOCUMENT_KIND_LABELS[attached.kind]);
      doc.moveDown(0.3);
      doc.fontSize(10).font("Helvetica").text(source.title);
      doc.moveDown(1);
      doc.fontSize(10).font("Helvetica").text(source.text, { align: "left", lineGap: 4 });
    }

    doc.moveDown(2);
    doc
      .fontSize(8)
      .fillColor("#666666")
      .text(`Generated for prior authorization, ${formatDateForDisplay(input.generatedAt)}.`, { align: "center" });

    doc.end();

    stream.on("finish", () => {
      resolve({ filePath, fileName });
    });

    stream.on("error", reject);
  });
}
