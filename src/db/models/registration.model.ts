import { Schema, type Connection, type Model, type Types } from 'mongoose';

export type RegistrationStatus = 'pending' | 'completed';

/**
 * Ticket de registro creado por el back-office del comercio.
 * Este servicio nunca los crea ni los borra: sólo los reclama.
 */
export interface RegistrationAttributes {
  code: string;
  status: RegistrationStatus;
  expiresAt: Date;
  shopId: string;
  shopName?: string | null;
  lineUserId?: string | null;
  lineDisplayName?: string | null;
  linePictureUrl?: string | null;
  completedAt?: Date | null;
}

export type RegistrationRecord = RegistrationAttributes & { _id: Types.ObjectId };

export type RegistrationModel = Model<RegistrationAttributes>;

const registrationSchema = new Schema<RegistrationAttributes>(
  {
    code: { type: String, required: true, index: true },
    status: { type: String, enum: ['pending', 'completed'], required: true, default: 'pending' },
    expiresAt: { type: Date, required: true },
    shopId: { type: String, required: true },
    shopName: { type: String, default: null },
    lineUserId: { type: String, default: null },
    lineDisplayName: { type: String, default: null },
    linePictureUrl: { type: String, default: null },
    completedAt: { type: Date, default: null },
  },
  { collection: 'registrations' },
);

export function createRegistrationModel(connection: Connection): RegistrationModel {
  return (
    connection.models.Registration ??
    connection.model<RegistrationAttributes>('Registration', registrationSchema)
  );
}
