/**
 * Prompt Templates
 *
 * Every prompt the turn pipeline sends to the model. Kept together so the
 * wording can be reviewed in one place.
 */

import type { ConversationTurn } from '../memory/types.js';
import type { RetrievedChunk } from '../search/types.js';

// ============================================================================
// Router
// ============================================================================

export const ROUTER_HISTORY_TURNS = 3;
export const ROUTER_TURN_CHARS = 200;

export const ROUTER_SYSTEM_PROMPT =
  'You are a query classifier for a billing support desk. Respond with only the category name.';

function renderHistory(turns: ConversationTurn[]): string {
  if (turns.length === 0) {
    return '(no earlier messages)';
  }
  return turns
    .slice(-ROUTER_HISTORY_TURNS)
    .map((turn) => `${turn.role === 'user' ? 'Customer' : 'Assistant'}: ${turn.text.slice(0, ROUTER_TURN_CHARS)}`)
    .join('\n');
}

export function buildRouterPrompt(query: string, recentTurns: ConversationTurn[]): string {
  return `Classify this customer query into ONE of these categories:

1. "account_specific" - Questions about the customer's OWN bill, charges, amounts, payments or account balance
   Examples: "What's my bill?", "How much do I owe?", "Why was I charged a late fee?"

2. "general_knowledge" - Questions about plans, pricing, policies, billing processes or anything not tied to one account
   Examples: "What plans do you offer?", "How does proration work?", "When was the company founded?"

Recent conversation:
${renderHistory(recentTurns)}

Customer Query: "${query}"

Respond with ONLY the category name, nothing else.`;
}

// ============================================================================
// Retrieved context
// ============================================================================

/**
 * Markdown sections, one per chunk, in retrieval order.
 */
export function formatContext(chunks: RetrievedChunk[]): string {
  return chunks
    .map(
      (chunk, i) => `### Source ${i + 1}
Document ID: ${chunk.docId}
Chunk ID: ${chunk.chunkId}
Relevance Score: ${chunk.score.toFixed(3)}
Content:
${chunk.text}`
    )
    .join('\n\n');
}

// ============================================================================
// General-knowledge responder
// ============================================================================

export const GENERAL_SYSTEM_PROMPT = `You are a friendly and professional customer service representative for a wireless carrier.

## Your Role
- Answer questions about plans, pricing, features and policies
- Be helpful, empathetic and concise

## CRITICAL RULES
1. NEVER state amounts from an individual customer's bill or balance.
   General list prices (e.g. "The Pro plan is $49.99/month") are fine.
2. Use only the reference material provided. If it does not answer the question, say so.`;

export function buildGeneralPrompt(query: string, chunks: RetrievedChunk[]): string {
  return `## Reference Material
${formatContext(chunks)}

## Customer Question
${query}

Answer in plain text.`;
}

// ============================================================================
// Account-specific responder
// ============================================================================

export const ACCOUNT_SYSTEM_PROMPT = `You are a billing specialist with access to customer account documents.

## Your Role
- Answer specific billing and account questions
- Use ONLY the retrieved documents. Never estimate or invent amounts.
- Cite every fact

## CRITICAL RULES
1. Every citation names the document ID and chunk ID it came from
2. Every quote is copied exactly from the document, at most 20 words
3. Any dollar amount in the answer must appear verbatim in one of the quotes
4. If the documents do not contain the answer, say what is missing

## Response Format
You MUST respond in this exact JSON format:
{
  "answer": "Your answer with exact amounts and dates",
  "citations": [
    { "doc_id": "document id", "chunk_id": "chunk id", "quote": "exact quote (max 20 words)" }
  ],
  "confidence_note": "Brief note on how confident you are"
}`;

export const STRICT_FORMAT_INSTRUCTIONS = `## Output Requirements
Your previous reply could not be parsed. Reply with ONE JSON object and nothing else:
no markdown fences, no text before or after it. "citations" must be an array whose
entries each have string "doc_id", "chunk_id" and "quote" fields.`;

export function buildAccountPrompt(
  query: string,
  chunks: RetrievedChunk[],
  sessionSummary: string,
  strict: boolean
): string {
  const sections = [`## Retrieved Documents\n${formatContext(chunks)}`];
  if (sessionSummary) {
    sections.push(
      `## Customer Context\n${sessionSummary}\nUse this to understand which customer and account the question is about.`
    );
  }
  sections.push(`## Customer Question\n${query}`);
  if (strict) {
    sections.push(STRICT_FORMAT_INSTRUCTIONS);
  }
  return sections.join('\n\n');
}

// ============================================================================
// Fixed replies
// ============================================================================

export const GENERAL_NOT_FOUND =
  'I could not find relevant information to answer your question in our reference material.';

export const ACCOUNT_NOT_FOUND =
  "I couldn't find specific information about your account in our records. " +
  'Please verify your account number and the billing period you are asking about.';

export const HANDOFF_APOLOGY =
  "I'm sorry, I couldn't complete that request right now. " +
  'Would you like me to connect you with a support specialist?';

export const SAFE_RESPONSE =
  "I'm sorry, I can't answer that reliably right now. " +
  'Would you like me to connect you with a support specialist?';

export const CLARIFYING_HEADER = 'I need a bit more information to answer your question accurately:';
