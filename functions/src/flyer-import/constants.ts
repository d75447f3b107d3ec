import { defineSecret } from "firebase-functions/params";
import { API_KEY_SECRET_LITERAL } from "../constants";

export const API_KEY_SECRET = defineSecret(API_KEY_SECRET_LITERAL);
export const MODEL_NAME = "gemini-2.5-flash";
export const MAX_PAGES_PER_CHUNK = 20;

export const PROMPT_FOR_TEXT_TRANSCRIPTION = `
Task: Transcribe all text from the provided promotional flyer, page by page.

Requirements:
- Output plain text only, no markdown, no JSON, no commentary
- Keep the original language and spelling (Lithuanian diacritics included)
- Keep every price exactly as printed, including the currency sign or unit (e.g. "1,99 €", "2.49 EUR", "€ 0,89", "99 ct")
- Keep every discount exactly as printed (e.g. "-20%", "30% nuolaida", "iki -50%")
- Keep each product name on the same line as, or directly before, its price
- Separate pages with a single blank line
`;
