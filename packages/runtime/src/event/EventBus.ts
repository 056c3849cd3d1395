import { EventEmitter } from "eventemitter3";
import { nanoid } from "nanoid";
import { filter, Observable } from "rxjs";
import type { BusEvent, EventType } from "../types/index.js";

export class EventBus {
  // 进程内推送通道；持久化的事件日志由 TaskStore 负责
  private emitter = new EventEmitter();

  public emit(event: BusEvent): void {
    this.emitter.emit("event", event);
  }

  /**
   * 构造并广播一条总线事件，traceId 统一使用 taskId。
   */
  public publish(
    type: EventType,
    taskId: string,
    payload: Record<string, unknown>
  ): BusEvent {
    const event: BusEvent = {
      eventId: nanoid(),
      type,
      timestamp: Date.now(),
      traceId: taskId,
      payload,
    };
    this.emit(event);
    return event;
  }

  /**
   * 冷 Observable：订阅时挂接监听，取消订阅时移除。
   */
  public events(): Observable<BusEvent> {
    return new Observable<BusEvent>((subscriber) => {
      const handler = (event: BusEvent) => subscriber.next(event);
      this.emitter.on("event", handler);
      return () => {
        this.emitter.off("event", handler);
      };
    });
  }

  public eventsOfType(type: EventType): Observable<BusEvent> {
    return this.events().pipe(filter((evt) => evt.type === type));
  }

  /** 只观察单个任务的事件流，供网关按任务推送进度 */
  public eventsForTask(taskId: string): Observable<BusEvent> {
    return this.events().pipe(filter((evt) => evt.traceId === taskId));
  }
}
