export { BookingModule } from './booking.module';
export { ReservationCoordinator } from './sagas/reservation-coordinator.service';
export { ReservationSide } from './sagas/reservation-side.enum';
export * from './outcomes/reservation-outcome';
