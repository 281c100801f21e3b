/**
 * Centralized Prompt Configuration
 * 
 * All LLM prompts are maintained in this single location.
 * 
 * Structure:
 * - documentSearch.ts: Document store answering and the no-grounding fallback
 */

export * from "./documentSearch";
