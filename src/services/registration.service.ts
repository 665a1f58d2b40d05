import type { Registration } from '../domain/registration.js';
import type { ClaimRegistrationDTO } from '../dtos/user.dto.js';
import { logger } from '../logger.js';
import type { RegistrationRepository } from '../repositories/registration.repository.js';
import type { UserRepository } from '../repositories/user.repository.js';

const log = logger.child({ service: 'registration' });

const REGISTRATION_CODE_PATTERN = /^\d{4}$/;

/**
 * ¿El texto es exactamente un código de 4 dígitos?
 */
export function isRegistrationCode(text: string): boolean {
    return REGISTRATION_CODE_PATTERN.test(text);
}

/**
 * Motor de reclamo de códigos de registro
 */
export class RegistrationService {

    constructor(
        private registrationRepository: RegistrationRepository,
        private userRepository: UserRepository
    ) {}

    /**
     * Reclama el ticket y marca al usuario como registrado.
     * null = código inexistente, usado o vencido; no es un error y no se reintenta.
     */
    async claim(dto: ClaimRegistrationDTO): Promise<Registration | null> {
        const registration = await this.registrationRepository.claim(dto);

        if (!registration) {
            log.info({ lineUserId: dto.lineUserId }, 'Código sin ticket pendiente');
            return null;
        }

        log.info(
            { lineUserId: dto.lineUserId, registrationId: registration.id, shopId: registration.shopId },
            'Ticket de registro reclamado'
        );

        // El ticket ya quedó consumido: una falla acá no debe ocultar el reclamo al usuario
        try {
            const user = await this.userRepository.markRegistered(dto.lineUserId, dto.code);
            if (!user) {
                log.warn({ lineUserId: dto.lineUserId }, 'Ticket reclamado para un usuario inexistente');
            }
        } catch (error) {
            log.error(
                { err: error, lineUserId: dto.lineUserId, registrationId: registration.id },
                'Ticket reclamado pero no se pudo marcar al usuario como registrado'
            );
        }

        return registration;
    }
}
