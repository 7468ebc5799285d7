/**
 * prompt-builder.ts - Renders agent requests into completion messages
 *
 * What this file does:
 * Turns a query, a symptom list, a medication name or a conversation, plus
 * the assembled context, into the role/content list sent to the completion
 * client. Wording lives in prompts/*.md so it can be edited without
 * touching code:
 *
 * - system.md: the base instruction for every request
 * - symptom-assessment.md: {symptoms}, {context}
 * - medication-info.md: {medicationName}, {context}
 *
 * Templates are read lazily on first use and cached. A placeholder with no
 * value, or a template file that can't be read, throws TemplateRenderError
 * at render time instead of sending a half-filled prompt.
 */

import * as fs from "fs";
import * as path from "path";
import { TemplateRenderError, describeError } from "../errors";
import type { CompletionMessage } from "../completion";
import type { ContextItem } from "../knowledge";
import type { ConversationMessage } from "./types";

/**
 * Default location of the templates.
 * Goes from src/agent/ up to project root, then into prompts/.
 */
export const DEFAULT_PROMPTS_DIR = path.join(__dirname, "../../prompts");

export type TemplateName = "system" | "symptom-assessment" | "medication-info";

export const MEDICAL_CONTEXT_HEADING = "Relevant medical information:";
export const MEDICATION_CONTEXT_HEADING = "Relevant medication information:";

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface PromptBuilderOptions {
  promptsDir?: string;
  /** Keep only the most recent N conversation messages after role filtering */
  historyLimit?: number;
}

export class PromptBuilder {
  private readonly promptsDir: string;
  private readonly historyLimit?: number;
  private readonly templates = new Map<TemplateName, string>();

  constructor(options: PromptBuilderOptions = {}) {
    this.promptsDir = options.promptsDir ?? DEFAULT_PROMPTS_DIR;
    this.historyLimit = options.historyLimit;
  }

  /** Free-form question: context goes into the system message */
  buildQueryMessages(query: string, context: ContextItem[]): CompletionMessage[] {
    return [
      { role: "system", content: this.systemWithContext(context) },
      { role: "user", content: query },
    ];
  }

  buildSymptomMessages(symptoms: string[], context: ContextItem[]): CompletionMessage[] {
    const prompt = this.render("symptom-assessment", {
      symptoms: symptoms.join(", "),
      context: formatContextBlock(context, MEDICAL_CONTEXT_HEADING),
    });
    return [
      { role: "system", content: this.template("system") },
      { role: "user", content: prompt },
    ];
  }

  buildMedicationMessages(
    medicationName: string,
    context: ContextItem[]
  ): CompletionMessage[] {
    const prompt = this.render("medication-info", {
      medicationName,
      context: formatContextBlock(context, MEDICATION_CONTEXT_HEADING),
    });
    return [
      { role: "system", content: this.template("system") },
      { role: "user", content: prompt },
    ];
  }

  /**
   * Multi-turn conversation: one system message carrying the context
   * retrieved for the latest user turn, then the history in its original
   * order with only user and assistant turns kept.
   */
  buildConversationMessages(
    history: ConversationMessage[],
    context: ContextItem[]
  ): CompletionMessage[] {
    const turns: CompletionMessage[] = [];
    for (const message of history) {
      if (message.role === "user" || message.role === "assistant") {
        turns.push({ role: message.role, content: message.content });
      }
    }

    const kept =
      this.historyLimit !== undefined && turns.length > this.historyLimit
        ? turns.slice(turns.length - this.historyLimit)
        : turns;

    return [{ role: "system", content: this.systemWithContext(context) }, ...kept];
  }

  /**
   * Substitutes {name} placeholders in a template.
   * Every placeholder must have a value; extra variables are ignored.
   */
  render(name: TemplateName, variables: Record<string, string>): string {
    const template = this.template(name);
    return template.replace(PLACEHOLDER, (_match, variable: string) => {
      const value = variables[variable];
      if (value === undefined) {
        throw new TemplateRenderError(
          name,
          `Template "${name}" references {${variable}} but no value was supplied`,
          variable
        );
      }
      return value;
    });
  }

  private systemWithContext(context: ContextItem[]): string {
    const base = this.template("system");
    const block = formatContextBlock(context, MEDICAL_CONTEXT_HEADING);
    return block ? `${base}\n\n${block}` : base;
  }

  private template(name: TemplateName): string {
    const cached = this.templates.get(name);
    if (cached !== undefined) return cached;

    const file = path.join(this.promptsDir, `${name}.md`);
    let content: string;
    try {
      content = fs.readFileSync(file, "utf8").trimEnd();
    } catch (error) {
      throw new TemplateRenderError(
        name,
        `Could not load prompt template from ${file}: ${describeError(error)}`
      );
    }
    this.templates.set(name, content);
    return content;
  }
}

/**
 * "<heading>\n" followed by the context texts separated by blank lines,
 * or "" when there is no context.
 */
export function formatContextBlock(context: ContextItem[], heading: string): string {
  if (context.length === 0) return "";
  return `${heading}\n${context.map((item) => item.text).join("\n\n")}`;
}
