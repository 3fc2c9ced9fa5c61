/** One `.appointment-item` as read off the reservation list. */
export interface ReservationRow {
  bookingId: string | null;
  customerName: string | null;
  serviceName: string | null;
  staffName: string | null;
  startTime: string | null;
  endTime: string | null;
  status: string | null;
  customerPhone: string | null;
  customerEmail: string | null;
}
