import { nanoid } from "nanoid";
import type { DeadLetterEntry, QueueMessage, TaskQueue } from "../types/index.js";

interface QueueSlot {
  message: QueueMessage;
  /** 在此时间之前对消费者不可见 */
  invisibleUntil: number;
}

export interface InMemoryTaskQueueOptions {
  now?: () => number;
}

/**
 * 至少一次投递：receive 不删除消息，只隐藏到可见性超时；
 * 未 ack 的消息到期后重新可见，投递次数累加。
 */
export class InMemoryTaskQueue implements TaskQueue {
  private slots: QueueSlot[] = [];

  private deadLetters: DeadLetterEntry[] = [];

  private readonly now: () => number;

  constructor(options: InMemoryTaskQueueOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async enqueue(taskId: string): Promise<string> {
    const message: QueueMessage = {
      messageId: nanoid(),
      taskId,
      deliveries: 0,
      enqueuedAt: this.now(),
    };
    this.slots.push({ message, invisibleUntil: 0 });
    return message.messageId;
  }

  async receive(visibilityTimeoutMs: number): Promise<QueueMessage | null> {
    const now = this.now();
    const slot = this.slots.find((candidate) => candidate.invisibleUntil <= now);
    if (!slot) {
      return null;
    }
    slot.invisibleUntil = now + visibilityTimeoutMs;
    slot.message = { ...slot.message, deliveries: slot.message.deliveries + 1 };
    return { ...slot.message };
  }

  async ack(message: QueueMessage): Promise<void> {
    this.slots = this.slots.filter((slot) => slot.message.messageId !== message.messageId);
  }

  async extend(message: QueueMessage, visibilityTimeoutMs: number): Promise<void> {
    const slot = this.find(message);
    if (slot) {
      slot.invisibleUntil = this.now() + visibilityTimeoutMs;
    }
  }

  async release(message: QueueMessage, delayMs = 0): Promise<void> {
    const slot = this.find(message);
    if (slot) {
      slot.invisibleUntil = this.now() + delayMs;
      slot.message = { ...slot.message, deliveries: Math.max(0, slot.message.deliveries - 1) };
    }
  }

  async deadLetter(message: QueueMessage, entry: DeadLetterEntry): Promise<void> {
    await this.ack(message);
    this.deadLetters.push({ ...entry });
  }

  async listDeadLetters(): Promise<DeadLetterEntry[]> {
    return this.deadLetters.map((entry) => ({ ...entry }));
  }

  /** 尚未 ack 的消息数（含不可见的） */
  public depth(): number {
    return this.slots.length;
  }

  private find(message: QueueMessage): QueueSlot | undefined {
    return this.slots.find((candidate) => candidate.message.messageId === message.messageId);
  }
}
