import { Schema, type Connection, type Model, type Types } from 'mongoose';

export type UserStatus = 'pending' | 'registered';

export interface UserAttributes {
  lineUserId: string;
  displayName?: string | null;
  pictureUrl?: string | null;
  status: UserStatus;
  registrationCode?: string | null;
  registeredAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Documento tal como sale de `lean()` */
export type UserRecord = UserAttributes & { _id: Types.ObjectId };

export type UserModel = Model<UserAttributes>;

const userSchema = new Schema<UserAttributes>(
  {
    lineUserId: { type: String, required: true, unique: true },
    displayName: { type: String, default: null },
    pictureUrl: { type: String, default: null },
    status: { type: String, enum: ['pending', 'registered'], required: true, default: 'pending' },
    registrationCode: { type: String, default: null },
    registeredAt: { type: Date, default: null },
  },
  { timestamps: true, collection: 'users' },
);

export function createUserModel(connection: Connection): UserModel {
  return connection.models.User ?? connection.model<UserAttributes>('User', userSchema);
}
