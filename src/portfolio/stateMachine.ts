export type TrackingState = 'ADOPTED' | 'MONITORED' | 'CLOSED';

export type TrackingEvent = 'RECONCILED' | 'POSITION_GONE' | 'CLOSED_BY_ENGINE';

export function nextTrackingState(current: TrackingState, event: TrackingEvent): TrackingState {
  if (current === 'CLOSED') {
    return current;
  }

  if (event === 'POSITION_GONE' || event === 'CLOSED_BY_ENGINE') {
    return 'CLOSED';
  }

  if (current === 'ADOPTED' && event === 'RECONCILED') {
    return 'MONITORED';
  }

  return current;
}
