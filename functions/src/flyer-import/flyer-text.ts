import { GoogleGenAI } from "@google/genai";
import { logger } from "firebase-functions/v2";
import * as fs from "fs";
import * as path from "path";
import { PDFDocument } from "pdf-lib";
import { MAX_PAGES_PER_CHUNK, MODEL_NAME, PROMPT_FOR_TEXT_TRANSCRIPTION } from "./constants";

/** Turns a downloaded flyer into one page-concatenated text blob. */
export interface FlyerTextProvider {
  extractText(filePath: string): Promise<string>;
}

export const splitPdf = async (filePath: string, chunkSize: number): Promise<string[]> => {
  const pdfBytes = await fs.promises.readFile(filePath);
  const pdfDoc = await PDFDocument.load(pdfBytes);
  const totalPages = pdfDoc.getPageCount();
  const chunkPaths: string[] = [];
  const outputDir = path.dirname(filePath);
  const baseName = path.basename(filePath, ".pdf");

  for (let i = 0; i < totalPages; i += chunkSize) {
    const newPdf = await PDFDocument.create();
    const endPage = Math.min(i + chunkSize, totalPages);
    const pagesToCopy = Array.from({ length: endPage - i }, (_, k) => i + k);
    const copiedPages = await newPdf.copyPages(pdfDoc, pagesToCopy);
    copiedPages.forEach((page) => newPdf.addPage(page));

    const chunkPath = path.join(outputDir, `${baseName}-chunk-${i / chunkSize + 1}.pdf`);
    await fs.promises.writeFile(chunkPath, await newPdf.save());
    chunkPaths.push(chunkPath);
  }

  return chunkPaths;
};

export class GeminiFlyerTextProvider implements FlyerTextProvider {
  constructor(
    private readonly ai: GoogleGenAI,
    private readonly chunkSize = MAX_PAGES_PER_CHUNK,
  ) {}

  static fromApiKey(apiKey: string): GeminiFlyerTextProvider {
    return new GeminiFlyerTextProvider(new GoogleGenAI({ apiKey }));
  }

  private async transcribeChunk(chunkPath: string): Promise<string> {
    const uploadedFile = await this.ai.files.upload({
      file: chunkPath,
      config: { mimeType: "application/pdf" },
    });
    if (!uploadedFile.uri) {
      throw new Error("Gemini upload returned no file URI");
    }

    const result = await this.ai.models.generateContent({
      model: MODEL_NAME,
      contents: [
        {
          role: "user",
          parts: [
            { text: PROMPT_FOR_TEXT_TRANSCRIPTION },
            { fileData: { mimeType: "application/pdf", fileUri: uploadedFile.uri } },
          ],
        },
      ],
      config: { temperature: 0.0 },
    });

    return result.text ?? "";
  }

  async extractText(filePath: string): Promise<string> {
    const chunkPaths = await splitPdf(filePath, this.chunkSize);
    const pageTexts: string[] = [];

    for (const [index, chunkPath] of chunkPaths.entries()) {
      try {
        const text = await this.transcribeChunk(chunkPath);
        if (text.trim()) pageTexts.push(text);
        logger.info("Transcribed flyer chunk", {
          chunkIndex: index + 1,
          totalChunks: chunkPaths.length,
          characters: text.length,
        });
      } catch (error) {
        logger.error("Error transcribing flyer chunk", {
          chunkPath,
          error: error instanceof Error ? error.message : "Unknown error",
        });
      } finally {
        if (fs.existsSync(chunkPath)) fs.unlinkSync(chunkPath);
      }
    }

    return pageTexts.join("\n");
  }
}
