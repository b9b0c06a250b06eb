import PDFDocument from "pdfkit";
import { toBuffer as renderQrPng } from "qrcode";
import { DocumentLayout } from "./layout";

export interface DocumentRenderer {
  render(layout: DocumentLayout): Promise<Buffer>;
}

export interface PdfKitRendererOptions {
  arabicFontPath?: string;
  arabicBoldFontPath?: string;
}

const MARGIN = 57;
const QR_SIZE = 85;
const LABEL_WIDTH = 142;
const COLORS = {
  text: "#2c3e50",
  muted: "#7f8c8d",
  accent: "#3498db",
  success: "#2ecc71",
  tableFill: "#ecf0f1",
  tableGrid: "#bdc3c7"
};

interface Fonts {
  regular: string;
  bold: string;
}

export class PdfKitDocumentRenderer implements DocumentRenderer {
  constructor(private readonly options: PdfKitRendererOptions = {}) {}

  async render(layout: DocumentLayout): Promise<Buffer> {
    const qrPng = await renderQrPng(layout.verificationUrl, {
      errorCorrectionLevel: "H",
      margin: 4,
      scale: 10
    });

    const doc = new PDFDocument({
      size: "A4",
      margins: { top: MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN },
      info: {
        Title: layout.title,
        Subject: layout.verificationUrl,
        Keywords: layout.verificationCode
      }
    });

    const done = new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];
      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => resolve(Buffer.concat(chunks)));
      doc.on("error", reject);
    });

    try {
      const fonts = this.registerFonts(doc, layout);
      this.draw(doc, layout, fonts, qrPng);
    } finally {
      doc.end();
    }

    return done;
  }

  private registerFonts(doc: PDFKit.PDFDocument, layout: DocumentLayout): Fonts {
    if (layout.direction === "ltr") {
      return { regular: "Helvetica", bold: "Helvetica-Bold" };
    }

    const { arabicFontPath, arabicBoldFontPath } = this.options;
    if (!arabicFontPath) {
      throw new Error("No font with Arabic glyphs is configured (ARABIC_FONT_PATH).");
    }

    doc.registerFont("Arabic", arabicFontPath);
    doc.registerFont("Arabic-Bold", arabicBoldFontPath || arabicFontPath);
    return { regular: "Arabic", bold: "Arabic-Bold" };
  }

  private draw(doc: PDFKit.PDFDocument, layout: DocumentLayout, fonts: Fonts, qrPng: Buffer): void {
    const width = doc.page.width - MARGIN * 2;
    const isLetter = layout.documentType === "acceptation";

    doc.image(qrPng, 34, 28, { width: QR_SIZE, height: QR_SIZE });

    doc.font(fonts.regular).fontSize(11).fillColor(COLORS.muted).text(layout.issuedLine, { align: "right" });
    doc.moveDown(1.5);

    doc.font(fonts.bold).fontSize(20).fillColor(COLORS.text).text(layout.heading, { align: "center" });
    doc
      .font(fonts.bold)
      .fontSize(13)
      .fillColor(isLetter ? COLORS.success : COLORS.accent)
      .text(layout.subheading, { align: "center" });
    doc.moveDown(0.5);
    doc
      .font(fonts.bold)
      .fontSize(isLetter ? 22 : 20)
      .fillColor(isLetter ? COLORS.success : COLORS.text)
      .text(layout.title, { align: "center" });
    doc.moveDown();

    doc.font(fonts.bold).fontSize(12).fillColor(COLORS.text);
    layout.recipient.forEach((line) => doc.text(line, { align: layout.align }));
    doc.moveDown();

    if (layout.subject) {
      doc.font(fonts.bold).text(layout.subject, { align: "center" });
      doc.moveDown();
    }

    doc.font(fonts.regular).text(layout.salutation, { align: layout.align });
    doc.moveDown(0.5);

    for (const block of layout.blocks) {
      if (block.kind === "table") {
        this.drawTable(doc, block.rows, layout, fonts, width);
      } else {
        doc.font(block.emphasis ? fonts.bold : fonts.regular).text(block.text, { align: layout.align });
      }
      doc.moveDown(0.5);
    }

    doc.font(fonts.regular).text(layout.signature[0], { align: layout.align });
    doc.font(fonts.bold).text(layout.signature[1], { align: layout.align });

    const footerY = doc.page.height - 70;
    // Footer sits inside the bottom margin; lift it so pdfkit does not open a new page.
    doc.page.margins.bottom = 0;
    doc
      .font(fonts.regular)
      .fontSize(9)
      .fillColor(COLORS.muted)
      .text(layout.verificationNote, MARGIN, footerY - 16, { width, align: "center" });
    doc
      .font(fonts.bold)
      .fontSize(13)
      .fillColor(COLORS.text)
      .text(layout.codeLine, MARGIN, footerY, { width, align: "center" });
  }

  private drawTable(
    doc: PDFKit.PDFDocument,
    rows: Array<[string, string]>,
    layout: DocumentLayout,
    fonts: Fonts,
    width: number
  ): void {
    const rtl = layout.direction === "rtl";
    const valueWidth = width - LABEL_WIDTH;
    const columns = rtl ? [valueWidth, LABEL_WIDTH] : [LABEL_WIDTH, valueWidth];
    const labelColumn = rtl ? 1 : 0;
    const padding = 8;
    let y = doc.y;

    doc.fontSize(12);
    for (const row of rows) {
      const heights = row.map((cell, index) =>
        doc.font(index === labelColumn ? fonts.bold : fonts.regular).heightOfString(cell, {
          width: columns[index] - padding * 2
        })
      );
      const rowHeight = Math.max(...heights) + padding * 2;

      let x = MARGIN;
      row.forEach((cell, index) => {
        doc.rect(x, y, columns[index], rowHeight).fillAndStroke(COLORS.tableFill, COLORS.tableGrid);
        doc
          .fillColor(COLORS.text)
          .font(index === labelColumn ? fonts.bold : fonts.regular)
          .text(cell, x + padding, y + padding, {
            width: columns[index] - padding * 2,
            align: rtl ? "right" : "left"
          });
        x += columns[index];
      });
      y += rowHeight;
    }

    doc.x = MARGIN;
    doc.y = y;
  }
}
