import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";

/**
 * The slice of a Gemini response the bridge reads. `GenerateContentResponse`
 * satisfies it structurally, which lets tests hand in plain objects.
 */
export interface GroundedResponse {
  text?: string;
  candidates?: Array<{
    groundingMetadata?: {
      groundingChunks?: Array<{
        retrievedContext?: {
          title?: string;
        };
      }>;
    };
  }>;
}

export type GenerateContentFn = (params: GenerateContentParameters) => Promise<GroundedResponse>;

let _gemini: GoogleGenAI | null = null;
function getGemini(apiKey: string): GoogleGenAI {
  if (!_gemini) {
    if (!apiKey) throw new Error("[LLM Client] GEMINI_API_KEY is not set");
    _gemini = new GoogleGenAI({ apiKey });
  }
  return _gemini;
}

export function createGenerateContent(apiKey: string): GenerateContentFn {
  return (params) => getGemini(apiKey).models.generateContent(params);
}
