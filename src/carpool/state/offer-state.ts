import { StateMachine } from '../../common/state/state-machine';
import { OfferStatus } from '../entities/carpool-offer.entity';

export const offerStateMachine = new StateMachine<OfferStatus>('offer', {
  [OfferStatus.ACTIVE]: [
    OfferStatus.FULL,
    OfferStatus.CANCELLED,
    OfferStatus.COMPLETED,
  ],
  [OfferStatus.FULL]: [
    OfferStatus.ACTIVE,
    OfferStatus.CANCELLED,
    OfferStatus.COMPLETED,
  ],
  [OfferStatus.CANCELLED]: [],
  [OfferStatus.COMPLETED]: [],
});

/** Offers that still hold seats for their passengers. */
export const OPEN_OFFER_STATUSES: readonly OfferStatus[] = [
  OfferStatus.ACTIVE,
  OfferStatus.FULL,
];
