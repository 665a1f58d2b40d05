import type { RegistrationRecord, RegistrationStatus } from '../db/models/registration.model.js';

/**
 * Ticket de registro (creado externamente por el comercio)
 */
export class Registration {
  constructor(
    public id: string,
    public code: string,
    public status: RegistrationStatus,
    public expiresAt: Date,
    public shopId: string,
    public shopName: string | null,
    public lineUserId: string | null,
    public completedAt: Date | null
  ) {}

  /** Nombre del comercio para mostrar; cae al id si no hay nombre */
  contextName(): string {
    return this.shopName && this.shopName.trim() !== '' ? this.shopName : this.shopId;
  }

  static create(data: RegistrationRecord): Registration {
    return new Registration(
      String(data._id),
      data.code,
      data.status,
      data.expiresAt,
      data.shopId,
      data.shopName ?? null,
      data.lineUserId ?? null,
      data.completedAt ?? null
    );
  }
}
