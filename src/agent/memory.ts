import type { LlmMessage } from "../llm/types";

export class Memory {
  private messages: LlmMessage[] = [];

  addMessage(role: LlmMessage["role"], content: string): void {
    this.messages.push({ content, role });
  }

  getMessages(): LlmMessage[] {
    return [...this.messages];
  }

  hasMessages(): boolean {
    return this.messages.length > 0;
  }

  estimateTokenCount(): number {
    const totalCharacters = this.messages.reduce((sum, message) => sum + message.content.length, 0);
    return Math.ceil(totalCharacters / 4);
  }
}
