/**
 * File question-answering skill.
 *
 * Reads a local text file, wraps it in a question or summary prompt and
 * hands the prompt to a language model. Every failure along the way
 * (missing path, disallowed extension, unreadable file, no model
 * configured, service errors) becomes its own reply sentence.
 *
 * @module skills/query-file
 */

import { readFile } from 'fs/promises';
import { CompletionError } from './types.js';
import type { CompletionClient, QueryFileOptions, Skill } from './types.js';

export const QUERY_FILE_SYSTEM_PROMPT =
  'You are a helpful assistant that analyzes documents and code. ' +
  'If analyzing code, provide explanations or summaries as if to a fellow programmer. ' +
  'If analyzing data like JSON or CSV, describe its structure or summarize its content.';

/**
 * Build the user prompt for a file, with or without a question.
 */
export function buildFilePrompt(filePath: string, content: string, question: string | null): string {
  if (question) {
    return `Based on the following document content retrieved from the file '${filePath}':\n\n---\n${content}\n---\n\nPlease answer this question: ${question}`;
  }
  return `Please summarize the key points of the following document retrieved from the file '${filePath}':\n\n---\n${content}\n---`;
}

function hasAllowedExtension(filePath: string, allowed: readonly string[]): boolean {
  const lower = filePath.toLowerCase();
  return allowed.some((ext) => lower.endsWith(ext.toLowerCase()));
}

type FileReadResult = { ok: true; content: string } | { ok: false; reply: string };

async function readTextFile(filePath: string): Promise<FileReadResult> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return { ok: false, reply: `Sorry, I couldn't find the file: ${filePath}` };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, reply: `Sorry, I encountered an error reading the file '${filePath}': ${message}` };
  }

  try {
    return { ok: true, content: new TextDecoder('utf-8', { fatal: true }).decode(bytes) };
  } catch {
    return {
      ok: false,
      reply: `Sorry, I had trouble reading the file '${filePath}'. It might not be a plain text file or has an unsupported encoding.`,
    };
  }
}

function completionFailureReply(err: unknown, filePath: string): string {
  if (err instanceof CompletionError) {
    switch (err.kind) {
      case 'authentication':
        return "Sorry, there's an issue with the AI service authentication. Please check the API key.";
      case 'rate-limit':
        return "Sorry, I've made too many requests to the AI service recently. Please try again later.";
      case 'connection':
        return "Sorry, I couldn't connect to the AI service. Please check your internet connection.";
      case 'status':
        process.stderr.write(`[query-file] AI service status ${err.status ?? 'unknown'} for '${filePath}': ${err.message}\n`);
        return `Sorry, the AI service reported an error (${err.status ?? 'unknown'}) while processing '${filePath}'.`;
      case 'api':
        process.stderr.write(`[query-file] AI service error for '${filePath}': ${err.message}\n`);
        return `Sorry, I encountered an error with the AI service while processing '${filePath}': ${err.message}`;
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[query-file] Unexpected error analyzing '${filePath}': ${message}\n`);
  return `Sorry, an unexpected error occurred while trying to analyze '${filePath}'.`;
}

/**
 * Create the file skill.
 *
 * @param options - Extension allow list and prompt budget
 * @param completion - Model client, or null when none is configured
 */
export function createQueryFileSkill(options: QueryFileOptions, completion: CompletionClient | null): Skill {
  return async (params) => {
    const filePath = params.filePath;
    const question = params.queryText ?? null;

    if (!filePath) {
      return 'You need to specify the path to the file.';
    }
    if (!hasAllowedExtension(filePath, options.allowedExtensions)) {
      return `Sorry, I can only analyze files with extensions: ${options.allowedExtensions.join(', ')}.`;
    }

    const file = await readTextFile(filePath);
    if (!file.ok) {
      return file.reply;
    }

    if (!completion) {
      return 'The language model API key is not configured. I cannot analyze the file.';
    }

    const prompt = buildFilePrompt(filePath, file.content, question);
    if (Array.from(prompt).length > options.maxPromptChars) {
      return `The content of '${filePath}' (plus your query, if any) is too long for me to process (over ${options.maxPromptChars} characters). Please try with a smaller file or a more specific query.`;
    }

    let answer: string;
    try {
      answer = await completion.complete({ system: QUERY_FILE_SYSTEM_PROMPT, prompt });
    } catch (err) {
      return completionFailureReply(err, filePath);
    }

    return answer.trim()
      ? answer
      : `I received an empty response from the AI for your query about '${filePath}'.`;
  };
}
