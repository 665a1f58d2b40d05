import type { RegistrationModel, RegistrationRecord } from '../db/models/registration.model.js';
import { Registration } from '../domain/registration.js';
import type { ClaimRegistrationDTO } from '../dtos/user.dto.js';

export interface RegistrationRepository {
    /**
     * Reclama un ticket pendiente y no vencido.
     * Devuelve null si el código no existe, ya fue usado o venció.
     */
    claim(dto: ClaimRegistrationDTO): Promise<Registration | null>;
}

export class MongoRegistrationRepository implements RegistrationRepository {

    constructor(private model: RegistrationModel) {}

    /**
     * Un único findOneAndUpdate: filtro y actualización son indivisibles,
     * así que entre reclamos concurrentes del mismo código sólo uno matchea.
     * Vencimiento y fecha de completado usan el reloj del servidor ($$NOW).
     */
    async claim(dto: ClaimRegistrationDTO): Promise<Registration | null> {
        // $literal evita que un valor que empiece con '$' se lea como ruta de campo
        const binding: Record<string, unknown> = {
            status: 'completed',
            lineUserId: { $literal: dto.lineUserId },
            completedAt: '$$NOW',
        };
        if (dto.displayName !== undefined) binding.lineDisplayName = { $literal: dto.displayName };
        if (dto.pictureUrl !== undefined) binding.linePictureUrl = { $literal: dto.pictureUrl };

        const data: RegistrationRecord | null = await this.model
            .findOneAndUpdate(
                {
                    code: dto.code,
                    status: 'pending',
                    $expr: { $gt: ['$expiresAt', '$$NOW'] },
                },
                [{ $set: binding }],
                { new: true }
            )
            .lean<RegistrationRecord>()
            .exec();

        return data ? Registration.create(data) : null;
    }
}
