import { formatTimestamp } from "../cache/timestamp.js";
import type { CachedMessage, UserInteractions } from "../cache/types.js";
import type { Message } from "./types.js";

const REPORT_FORMAT = `Present the report in Markdown with these sections:
- **Key communication patterns** (e.g. one-way communication, active discussion, issues left unspoken)
- **Quality of feedback** (e.g. constructive, destructive, absent, task-only)
- **Overall atmosphere** (e.g. formal, informal, tense, supportive)
- **Recommendations** (concrete steps to improve communication)`;

export const CHAT_SYSTEM_PROMPT = `You are an AI assistant and communication coach. Your job is to analyze
work chat conversations impartially.

Analyze the provided chat excerpt to identify communication patterns, assess the
quality of feedback and the general atmosphere in the team. Your goal is to help
the team lead improve team dynamics and build a healthy working environment.

Do not judge personalities; analyze the text only.
${REPORT_FORMAT}`;

export const USER_SYSTEM_PROMPT = `You are an AI assistant and communication coach. You are given the
messages of one chat participant together with nearby messages from the people
they talk to.

Describe this participant's communication style: tone, clarity, responsiveness,
how they give and receive feedback, and how their style differs between partners.

Do not judge personality; analyze the text only.
${REPORT_FORMAT}`;

/** `YYYY-MM-DD HH:MM` in UTC. */
function shortTime(ms: number): string {
  return formatTimestamp(ms).slice(0, 16);
}

export function formatTranscriptLine(message: CachedMessage): string {
  return `[${shortTime(message.timestamp)}] ${message.username}: ${message.text}`;
}

export function formatTranscript(messages: readonly CachedMessage[]): string {
  return messages.map(formatTranscriptLine).join("\n");
}

export function buildChatAnalysisPrompt(messages: readonly CachedMessage[]): Message[] {
  return [
    { role: "system", content: CHAT_SYSTEM_PROMPT },
    {
      role: "user",
      content: `Here is the chat history to analyze:\n\n${formatTranscript(messages)}`,
    },
  ];
}

export interface UserPromptContext {
  username: string;
  messages: readonly CachedMessage[];
  interactions: UserInteractions;
}

export function buildUserAnalysisPrompt(ctx: UserPromptContext): Message[] {
  const sections: string[] = [];

  sections.push(`## Messages by ${ctx.username}\n${formatTranscript(ctx.messages)}`);

  for (const [partner, records] of ctx.interactions.partners) {
    const lines: string[] = [];
    for (const record of records) {
      lines.push(formatTranscriptLine(record.partnerMessage));
      if (record.userMessage) {
        lines.push(`  ↳ replying to ${ctx.username}: ${record.userMessage.text}`);
      }
    }
    sections.push(`## Exchanges with ${partner}\n${lines.join("\n")}`);
  }

  return [
    { role: "system", content: USER_SYSTEM_PROMPT },
    {
      role: "user",
      content: `Analyze the communication style of ${ctx.username}.\n\n${sections.join("\n\n")}`,
    },
  ];
}
