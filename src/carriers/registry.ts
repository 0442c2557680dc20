import { Carrier } from '../domain/models';
import { CarrierTracker } from './types';

export class TrackerRegistry {
    private trackers: Map<Carrier, CarrierTracker> = new Map();
    register(tracker: CarrierTracker): void {
        this.trackers.set(tracker.carrier, tracker);
    }
    get(carrier: Carrier): CarrierTracker | undefined {
        return this.trackers.get(carrier);
    }
    listCarriers(): Carrier[] {
        return Array.from(this.trackers.keys());
    }
    has(carrier: Carrier): boolean {
        return this.trackers.has(carrier);
    }
}
