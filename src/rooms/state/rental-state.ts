import { StateMachine } from '../../common/state/state-machine';
import { RentalStatus } from '../entities/room-rental.entity';

export const rentalStateMachine = new StateMachine<RentalStatus>('rental', {
  [RentalStatus.PENDING]: [
    RentalStatus.APPROVED,
    RentalStatus.REJECTED,
    RentalStatus.CANCELLED,
  ],
  [RentalStatus.APPROVED]: [RentalStatus.CANCELLED, RentalStatus.COMPLETED],
  [RentalStatus.REJECTED]: [],
  [RentalStatus.CANCELLED]: [],
  [RentalStatus.COMPLETED]: [],
});
