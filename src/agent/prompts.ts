/**
 * Prompt Templates
 *
 * Placeholders use `{name}` (see renderTemplate); `{{` / `}}` are literal
 * braces. Every template takes `{language}` (display name) and `{fence}`
 * (code fence tag) for the symbol's source language.
 */

import type { SourceLanguage } from '../indexer/types.js';

export const LANGUAGE_DISPLAY: Readonly<Record<SourceLanguage, string>> = {
  python: 'Python',
  typescript: 'TypeScript',
  javascript: 'JavaScript',
};

/**
 * The `{language}` and `{fence}` variables for a source language.
 */
export function languageVariables(language: SourceLanguage): { language: string; fence: string } {
  return { language: LANGUAGE_DISPLAY[language], fence: language };
}

/**
 * Research loop. Variables: code, context, tools_info, history, language, fence.
 */
export const RESEARCH_LOOP_PROMPT = `You are a Senior {language} Engineer researching a piece of code before it is documented.
Use the tools to find out how the code is used and what it depends on, then write a technical analysis.

Code to analyze:
\`\`\`{fence}
{code}
\`\`\`

Related symbols (from the vector index):
{context}

{tools_info}

Previous steps:
{history}

Respond with exactly ONE JSON object and nothing else.

To call a tool:
{{"thought": "why you need it", "action": "<tool name>", "args": {{"<param>": "<value>"}}}}

When you know enough:
{{"action": "FINISH", "analysis": "summary, parameters, return value, exceptions, side effects and usage examples"}}

Call at most one tool per reply. Do not repeat a tool call whose result is already in the previous steps.
`;

/**
 * Impact loop. Variables: symbol_id, code, analysis, tools_info, history, language, fence.
 */
export const IMPACT_LOOP_PROMPT = `You are a Software Architect checking the impact of a code change on existing documentation.

Changed symbol: {symbol_id}

New code:
\`\`\`{fence}
{code}
\`\`\`

Analysis of the change:
{analysis}

{tools_info}

Previous steps:
{history}

Find the symbols that call or depend on {symbol_id} (search_code), read their current documentation (get_doc_for_symbol)
and decide whether that documentation is now wrong or incomplete.

Respond with exactly ONE JSON object and nothing else.

To call a tool:
{{"thought": "why you need it", "action": "<tool name>", "args": {{"<param>": "<value>"}}}}

When you are done:
{{"action": "FINISH", "impact_instructions": [{{"symbol_id": "<dependent symbol id>", "original_docs": "<its current documentation>", "update_instructions": "<what must change>"}}]}}

Return an empty impact_instructions list when no other documentation needs to change. Never list {symbol_id} itself.
`;

/**
 * Analysis step of the rag and review strategies. Variables: code, context,
 * feedback, language, fence.
 */
export const CODE_EXPERT_PROMPT = `You are a Senior {language} Engineer (Code Expert).
Analyze the following code and its context to understand its behavior, parameters, return values and possible exceptions.

Context (related symbols):
{context}

Previous feedback (if any):
{feedback}

Code to analyze:
\`\`\`{fence}
{code}
\`\`\`

Provide a technical analysis with:
1. Summary of functionality.
2. Parameters (name, type, description).
3. Return value (type, description).
4. Exceptions raised.
5. Usage examples.

Be factual. Output ONLY the analysis, without any internal monologue.
`;

/**
 * Markdown rendering step. Variables: analysis, existing_docs, language, fence.
 */
export const DOCS_EXPERT_PROMPT = `You are a Technical Writer.
Turn the technical analysis into Markdown API documentation.

Technical analysis:
{analysis}

Existing documentation (update it instead of starting over, if present):
{existing_docs}

Use this structure:
### \`SymbolName\`

**Summary**
...

**Parameters**
- \`name\` (type): description

**Returns**
- (type): description

**Raises**
- \`Exception\`: description

**Examples**
\`\`\`{fence}
...
\`\`\`

**See also**
...

Output ONLY the Markdown. No reasoning, no conversational text, and do not wrap the output in a code block.
`;

/**
 * Review step of the review strategy. Variables: code, current_docs,
 * usage_context, language, fence.
 */
export const DOCS_REVIEW_PROMPT = `You are a Lead Software Architect reviewing generated documentation for one {language} symbol.
Make sure it is complete and accurate.

Code:
\`\`\`{fence}
{code}
\`\`\`

Generated documentation:
{current_docs}

Usage context (where this symbol is used in the codebase):
{usage_context}

Check for missing parameters, return type mismatches and undocumented exceptions.
Check whether the documented behavior would break any of the usages listed above.
Approve accurate and complete documentation; otherwise give specific feedback for the Code Expert.

Output a JSON object:
{{
  "status": "APPROVED" or "REVISION_NEEDED",
  "reasoning": "your step-by-step reasoning",
  "feedback": "specific instructions for the Code Expert; empty if APPROVED"
}}
`;

/**
 * Judge for `docweave evaluate`. Variables: code, doc, language, fence.
 */
export const DOC_EVALUATION_PROMPT = `You are an expert code reviewer and documentation auditor.
Evaluate how accurately the DOCUMENTATION describes the {language} SOURCE CODE.

SOURCE CODE:
\`\`\`{fence}
{code}
\`\`\`

DOCUMENTATION:
\`\`\`markdown
{doc}
\`\`\`

Instructions:
1. Compare the code logic, parameters, return values and exceptions with the documentation.
2. Identify inaccuracies, missing information or hallucinations.
3. Give a concise critique of the issues.
4. If there are no issues, state that the documentation is accurate.
`;
