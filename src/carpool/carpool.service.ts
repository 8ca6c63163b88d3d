import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Not, Repository } from 'typeorm';

import { Driver, DriverStatus } from './entities/driver.entity';
import { CarpoolOffer, OfferStatus } from './entities/carpool-offer.entity';
import {
  CarpoolPassenger,
  PassengerStatus,
} from './entities/carpool-passenger.entity';
import { CreateOfferDto } from './dto/create-offer.dto';
import { offerStateMachine, OPEN_OFFER_STATUSES } from './state/offer-state';
import { releaseSeat, reserveSeat } from './seat-ledger';
import { Event } from '../events/entities/event.entity';
import { AuditService } from '../audit/audit.service';
import { AuditAction } from '../audit/entities/audit-log.entity';
import { runSerializable } from '../common/database/transaction';
import { fail, ok, Result } from '../common/result';

export interface UserCarpools {
  asDriver: CarpoolOffer[];
  asPassenger: CarpoolPassenger[];
}

export interface Reassignment {
  passenger: CarpoolPassenger;
  fromOffer: CarpoolOffer;
  toOffer: CarpoolOffer;
}

@Injectable()
export class CarpoolService {
  private readonly logger = new Logger(CarpoolService.name);

  constructor(
    @InjectRepository(CarpoolOffer)
    private readonly offerRepo: Repository<CarpoolOffer>,
    @InjectRepository(CarpoolPassenger)
    private readonly passengerRepo: Repository<CarpoolPassenger>,
    @InjectRepository(Driver)
    private readonly driverRepo: Repository<Driver>,
    private readonly auditService: AuditService,
    private readonly dataSource: DataSource,
  ) {}

  // ─── Offers ────────────────────────────────────────────────────────────────

  async createOffer(
    driverId: string,
    userId: string,
    dto: CreateOfferDto,
  ): Promise<Result<CarpoolOffer>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const driver = await manager.findOne(Driver, { where: { id: driverId } });
      if (!driver) return fail('not_found', 'Driver not found');

      if (driver.userId !== userId) {
        return fail('forbidden', 'Only the driver can create offers');
      }

      if (driver.status !== DriverStatus.ACTIVE) {
        return fail(
          'forbidden',
          'Driver account is not active. Contact administrator.',
        );
      }

      const event = await manager.findOne(Event, {
        where: { id: dto.eventId },
      });
      if (!event) return fail('not_found', 'Event not found');

      const offers = manager.getRepository(CarpoolOffer);

      // A full offer still belongs to the driver and reopens on the next
      // leave, so it counts as the driver's open offer too.
      const open = await offers.findOne({
        where: {
          driverId,
          eventId: dto.eventId,
          status: In([...OPEN_OFFER_STATUSES]),
        },
      });
      if (open) {
        return fail(
          'conflict',
          'You already have an active offer for this event',
        );
      }

      const offer = await offers.save(
        offers.create({
          driverId,
          eventId: dto.eventId,
          totalSeats: driver.capacity,
          seatsAvailable: driver.capacity,
          departureInfo: dto.departureInfo,
          departureAddress: dto.departureAddress ?? null,
          latitude: dto.latitude ?? null,
          longitude: dto.longitude ?? null,
          departureTime: new Date(dto.departureTime),
          status: OfferStatus.ACTIVE,
        }),
      );

      return ok(offer, 'Carpool offer created successfully');
    });

    if (result.success) {
      this.logger.log(
        `Carpool offer created: offerId=${result.data.id} driver=${driverId} event=${dto.eventId}`,
      );
    }
    return result;
  }

  async cancelOffer(
    offerId: string,
    userId: string,
  ): Promise<Result<CarpoolOffer>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const offers = manager.getRepository(CarpoolOffer);
      const offer = await offers.findOne({ where: { id: offerId } });
      if (!offer) return fail('not_found', 'Offer not found');

      const owned = await this.isOfferDriver(
        manager.getRepository(Driver),
        offer,
        userId,
      );
      if (!owned) {
        return fail('forbidden', 'Only the driver can cancel this offer');
      }

      const transition = offerStateMachine.check(
        offer.status,
        OfferStatus.CANCELLED,
      );
      if (!transition.success) return transition;

      const confirmed = await manager.getRepository(CarpoolPassenger).count({
        where: { offerId, status: PassengerStatus.CONFIRMED },
      });
      if (confirmed > 0) {
        return fail(
          'conflict',
          `Cannot cancel: ${confirmed} passengers have confirmed. Please contact them first.`,
        );
      }

      offer.status = OfferStatus.CANCELLED;
      return ok(
        await offers.save(offer),
        'Carpool offer cancelled successfully',
      );
    });

    if (result.success) {
      this.logger.log(`Carpool offer cancelled: offerId=${offerId}`);
    }
    return result;
  }

  async completeOffer(
    offerId: string,
    userId: string,
  ): Promise<Result<CarpoolOffer>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const offers = manager.getRepository(CarpoolOffer);
      const offer = await offers.findOne({ where: { id: offerId } });
      if (!offer) return fail('not_found', 'Offer not found');

      const owned = await this.isOfferDriver(
        manager.getRepository(Driver),
        offer,
        userId,
      );
      if (!owned) {
        return fail('forbidden', 'Only the driver can complete this offer');
      }

      const transition = offerStateMachine.check(
        offer.status,
        OfferStatus.COMPLETED,
      );
      if (!transition.success) return transition;

      offer.status = OfferStatus.COMPLETED;
      return ok(await offers.save(offer), 'Carpool offer marked as completed');
    });

    if (result.success) {
      this.logger.log(`Carpool offer completed: offerId=${offerId}`);
    }
    return result;
  }

  // ─── Passengers ────────────────────────────────────────────────────────────

  async joinOffer(
    offerId: string,
    passengerId: string,
    pickupLocation?: string,
    notes?: string,
  ): Promise<Result<CarpoolPassenger>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const offers = manager.getRepository(CarpoolOffer);
      const offer = await offers.findOne({ where: { id: offerId } });
      if (!offer) return fail('not_found', 'Carpool offer not found');

      if (offer.status !== OfferStatus.ACTIVE) {
        return fail('conflict', 'This carpool offer is no longer active');
      }

      if (offer.seatsAvailable <= 0) {
        return fail('conflict', 'No seats available');
      }

      const driver = await manager.findOne(Driver, {
        where: { id: offer.driverId },
      });
      if (!driver || driver.status !== DriverStatus.ACTIVE) {
        return fail(
          'conflict',
          'The driver of this carpool offer is not currently active',
        );
      }

      if (driver.userId === passengerId) {
        return fail('validation', 'You cannot join your own carpool offer');
      }

      const passengers = manager.getRepository(CarpoolPassenger);
      const existing = await passengers.findOne({
        where: {
          offerId,
          passengerId,
          status: Not(PassengerStatus.CANCELLED),
        },
      });
      if (existing) {
        return fail('conflict', 'You have already joined this carpool');
      }

      const reserved = reserveSeat(offer);
      if (!reserved.success) return reserved;
      await offers.save(offer);

      const passenger = await passengers.save(
        passengers.create({
          offerId,
          passengerId,
          status: PassengerStatus.CONFIRMED,
          pickupLocation: pickupLocation ?? null,
          notes: notes ?? null,
        }),
      );

      return ok(passenger, 'Successfully joined carpool');
    });

    if (result.success) {
      this.logger.log(
        `Passenger joined: offerId=${offerId} passenger=${passengerId}`,
      );
    }
    return result;
  }

  async leaveOffer(
    offerId: string,
    passengerId: string,
  ): Promise<Result<CarpoolPassenger>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const passengers = manager.getRepository(CarpoolPassenger);
      const passenger = await passengers.findOne({
        where: { offerId, passengerId, status: PassengerStatus.CONFIRMED },
      });
      if (!passenger) {
        return fail('not_found', 'You are not part of this carpool');
      }

      const offers = manager.getRepository(CarpoolOffer);
      const offer = await offers.findOne({ where: { id: offerId } });
      if (!offer) return fail('not_found', 'Carpool offer not found');

      passenger.status = PassengerStatus.CANCELLED;
      const saved = await passengers.save(passenger);

      releaseSeat(offer);
      await offers.save(offer);

      return ok(saved, 'Successfully left carpool');
    });

    if (result.success) {
      this.logger.log(
        `Passenger left: offerId=${offerId} passenger=${passengerId}`,
      );
    }
    return result;
  }

  /**
   * Moves a passenger record to another offer of the same event. The target
   * loses a seat; the source gets one back only if the record was holding
   * one.
   */
  async reassignPassenger(
    passengerRecordId: string,
    newOfferId: string,
    adminId: string,
  ): Promise<Result<Reassignment>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const passengers = manager.getRepository(CarpoolPassenger);
      const offers = manager.getRepository(CarpoolOffer);

      const record = await passengers.findOne({
        where: { id: passengerRecordId },
      });
      if (!record) return fail('not_found', 'Passenger record not found');

      const target = await offers.findOne({ where: { id: newOfferId } });
      if (!target) return fail('not_found', 'Target carpool offer not found');

      if (record.offerId === target.id) {
        return fail(
          'validation',
          'Passenger is already assigned to this carpool',
        );
      }

      const source = await offers.findOne({ where: { id: record.offerId } });
      if (!source) return fail('not_found', 'Carpool offer not found');

      if (source.eventId !== target.eventId) {
        return fail(
          'validation',
          'Cannot reassign passenger to a carpool for a different event',
        );
      }

      if (target.seatsAvailable <= 0) {
        return fail('conflict', 'Target carpool offer is full');
      }

      if (!OPEN_OFFER_STATUSES.includes(target.status)) {
        return fail('validation', 'Target carpool offer is not active');
      }

      const targetDriver = await manager.findOne(Driver, {
        where: { id: target.driverId },
      });
      if (!targetDriver || targetDriver.status !== DriverStatus.ACTIVE) {
        return fail(
          'conflict',
          'The driver of the target carpool offer is not currently active',
        );
      }

      if (targetDriver.userId === record.passengerId) {
        return fail(
          'validation',
          'Passenger cannot be assigned to their own carpool offer',
        );
      }

      const duplicate = await passengers.findOne({
        where: {
          offerId: target.id,
          passengerId: record.passengerId,
          status: Not(PassengerStatus.CANCELLED),
        },
      });
      if (duplicate) {
        return fail(
          'conflict',
          'Passenger has already joined the target carpool',
        );
      }

      const wasConfirmed = record.status === PassengerStatus.CONFIRMED;

      const reserved = reserveSeat(target);
      if (!reserved.success) return reserved;
      if (wasConfirmed) releaseSeat(source);
      await offers.save([source, target]);

      record.offerId = target.id;
      record.status = PassengerStatus.CONFIRMED;
      const saved = await passengers.save(record);

      await this.auditService.log(
        {
          action: AuditAction.PASSENGER_REASSIGNED,
          userId: adminId,
          resourceId: saved.id,
          meta: {
            passengerId: saved.passengerId,
            fromOfferId: source.id,
            toOfferId: target.id,
            wasConfirmed,
          },
        },
        manager,
      );

      return ok(
        { passenger: saved, fromOffer: source, toOffer: target },
        'Passenger reassigned successfully to the new carpool',
      );
    });

    if (result.success) {
      this.logger.log(
        `Passenger reassigned: record=${passengerRecordId} ${result.data.fromOffer.id} -> ${newOfferId}`,
      );
    }
    return result;
  }

  // ─── Listings ──────────────────────────────────────────────────────────────

  getEventOffers(eventId: string): Promise<CarpoolOffer[]> {
    return this.offerRepo.find({
      where: { eventId, status: OfferStatus.ACTIVE },
      relations: { driver: true },
      order: { seatsAvailable: 'DESC' },
    });
  }

  async getUserCarpools(userId: string): Promise<UserCarpools> {
    const driver = await this.driverRepo.findOne({ where: { userId } });

    const asDriver = driver
      ? await this.offerRepo.find({
          where: { driverId: driver.id },
          relations: { passengers: true },
          order: { createdAt: 'DESC' },
        })
      : [];

    const asPassenger = await this.passengerRepo.find({
      where: { passengerId: userId, status: Not(PassengerStatus.CANCELLED) },
      relations: { offer: true },
      order: { joinedAt: 'DESC' },
    });

    return { asDriver, asPassenger };
  }

  getAllPassengers(eventId?: string): Promise<CarpoolPassenger[]> {
    return this.passengerRepo.find({
      where: eventId ? { offer: { eventId } } : {},
      relations: { offer: true },
      order: { joinedAt: 'DESC' },
    });
  }

  // ─── Private helpers ───────────────────────────────────────────────────────

  private async isOfferDriver(
    drivers: Repository<Driver>,
    offer: CarpoolOffer,
    userId: string,
  ): Promise<boolean> {
    const driver = await drivers.findOne({ where: { id: offer.driverId } });
    return driver !== null && driver.userId === userId;
  }
}
