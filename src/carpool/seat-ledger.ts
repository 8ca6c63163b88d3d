import { CarpoolOffer, OfferStatus } from './entities/carpool-offer.entity';
import { fail, ok, Result } from '../common/result';

/**
 * Every change to `seatsAvailable` goes through these two functions so the
 * full/active flag can never drift from the seat count.
 */
export function reserveSeat(offer: CarpoolOffer): Result<CarpoolOffer> {
  if (offer.seatsAvailable <= 0) {
    return fail('conflict', 'No seats available');
  }

  offer.seatsAvailable -= 1;
  if (offer.seatsAvailable === 0 && offer.status === OfferStatus.ACTIVE) {
    offer.status = OfferStatus.FULL;
  }
  return ok(offer, 'Seat reserved');
}

export function releaseSeat(offer: CarpoolOffer): CarpoolOffer {
  if (offer.seatsAvailable < offer.totalSeats) {
    offer.seatsAvailable += 1;
  }
  if (offer.status === OfferStatus.FULL && offer.seatsAvailable > 0) {
    offer.status = OfferStatus.ACTIVE;
  }
  return offer;
}
