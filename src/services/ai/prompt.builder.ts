import type { ClassifyContext, GenerationContext } from '@core/interfaces/llm.types.js';
import type { ConversationTurn } from '@core/interfaces/conversation.types.js';

const MAX_HISTORY_CHARS = 800;

function historyLines(history: ConversationTurn[]): string[] {
  const lines: string[] = [];
  let budget = MAX_HISTORY_CHARS;
  for (const turn of [...history].reverse()) {
    const line = `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.text}`;
    if (line.length > budget) break;
    budget -= line.length;
    lines.unshift(line);
  }
  return lines;
}

export class PromptBuilder {
  classification(context: ClassifyContext): string {
    const lines: string[] = [];
    lines.push('You classify messages sent to a dental clinic on WhatsApp, Instagram or TikTok.');
    lines.push('Messages are usually Gulf Arabic, sometimes English or mixed.');
    lines.push(`Today is ${context.today} (${context.timezone}).`);
    lines.push(
      'Intents: greeting, booking_request, availability_query (is a doctor in on a day), price_query, info_query (doctors, branches, services, hours, contact), clarification_answer (a short answer to the assistant\'s last question), unknown.',
    );
    lines.push('Return entities exactly as the user wrote them; use null for anything not mentioned.');
    lines.push('Dates: convert to YYYY-MM-DD. Times: HH:mm in 24h. Phone: digits only.');
    lines.push('topic is one of hours, branches, doctors, services, contact, or null.');
    lines.push('If you are unsure, answer unknown with confidence below 0.5.');
    if (context.doctors.length) lines.push(`Known doctors: ${context.doctors.join(', ')}`);
    if (context.services.length) lines.push(`Known services: ${context.services.join(', ')}`);
    if (context.branches.length) lines.push(`Known branches: ${context.branches.join(', ')}`);
    const history = historyLines(context.history);
    if (history.length) {
      lines.push('Recent conversation:');
      lines.push(...history);
    }
    return lines.join('\n');
  }

  generation(context: GenerationContext): string {
    const lines: string[] = [];
    lines.push('You are the assistant of a dental clinic replying on a messaging app.');
    lines.push(
      context.locale === 'ar'
        ? 'Reply in Gulf Arabic, in two or three short sentences.'
        : 'Reply in English, in two or three short sentences.',
    );
    lines.push('Only state facts listed below. Never invent prices, doctors, schedules or availability.');
    lines.push('If the question cannot be answered from the facts, suggest contacting the clinic or booking a visit.');
    if (context.facts.length) {
      lines.push('Facts:');
      lines.push(...context.facts.map((fact) => `- ${fact}`));
    }
    const history = historyLines(context.history);
    if (history.length) {
      lines.push('Recent conversation:');
      lines.push(...history);
    }
    return lines.join('\n');
  }
}
