import { EntityManager, In, Repository } from 'typeorm';
import { RentalStatus, RoomRental } from '../entities/room-rental.entity';
import { rangesOverlap, TimeRange } from './time-range';

type RentalSource = EntityManager | Repository<RoomRental>;

function rentalsOf(source: RentalSource): Repository<RoomRental> {
  return source instanceof EntityManager
    ? source.getRepository(RoomRental)
    : source;
}

/**
 * First rental of `roomId` in one of `statuses` whose range overlaps `range`.
 * Pass the transaction manager so the read takes part in the serializable
 * snapshot of the write that follows it.
 */
export async function findOverlappingRental(
  source: RentalSource,
  roomId: string,
  range: TimeRange,
  statuses: readonly RentalStatus[],
  excludeRentalId?: string,
): Promise<RoomRental | null> {
  const candidates = await rentalsOf(source).find({
    where: { roomId, status: In([...statuses]) },
  });

  return (
    candidates.find(
      (rental) =>
        rental.id !== excludeRentalId &&
        rangesOverlap(range, { start: rental.startTime, end: rental.endTime }),
    ) ?? null
  );
}
