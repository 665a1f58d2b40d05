import type { UserRecord, UserStatus } from '../db/models/user.model.js';

/**
 * Entidad User - Usuario de LINE conocido por el bot
 * Lógica mínima de negocio
 */
export class User {
  constructor(
    public id: string,
    public lineUserId: string,
    public displayName: string | null,
    public pictureUrl: string | null,
    public status: UserStatus,
    public registrationCode: string | null,
    public registeredAt: Date | null,
    public createdAt: Date,
    public updatedAt: Date
  ) {}

  nameOr(fallback: string): string {
    return this.displayName && this.displayName.trim() !== '' ? this.displayName : fallback;
  }

  /**
   * Factory method para crear desde el documento lean de mongoose
   */
  static create(data: UserRecord): User {
    return new User(
      String(data._id),
      data.lineUserId,
      data.displayName ?? null,
      data.pictureUrl ?? null,
      data.status,
      data.registrationCode ?? null,
      data.registeredAt ?? null,
      data.createdAt,
      data.updatedAt
    );
  }
}
