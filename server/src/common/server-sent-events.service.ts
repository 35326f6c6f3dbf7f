import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, type Observable, Subject } from "rxjs";
import { type EscrowEvent, ESCROW_EVENT_WILDCARD } from "./escrow.event";

export type SseEvent<T> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<EscrowEvent>();

	escrowEvents(escrowId?: string): Observable<EscrowEvent> {
		if (escrowId) {
			return this.events$.pipe(filter((e) => e.escrowId === escrowId));
		}
		return this.events$.asObservable();
	}

	@OnEvent(ESCROW_EVENT_WILDCARD)
	onEscrowEvent(evt: EscrowEvent) {
		this.events$.next(evt);
	}
}
