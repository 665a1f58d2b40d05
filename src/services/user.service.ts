import type { User } from '../domain/user.js';
import type { EnsureUserDTO } from '../dtos/user.dto.js';
import { NotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import type { UserRepository } from '../repositories/user.repository.js';
import type { MessagingGateway } from './line.service.js';

const log = logger.child({ service: 'user-service' });

/**
 * Directorio de usuarios de LINE
 */
export class UserService {

    constructor(
        private userRepository: UserRepository,
        private messaging: Pick<MessagingGateway, 'getProfile'>
    ) {}

    /**
     * Registra (pending) o refresca al usuario con su perfil de LINE.
     * Si el perfil no se puede obtener igual se registra, sin nombre/foto.
     */
    async resolveUser(lineUserId: string): Promise<User> {
        const profile = await this.messaging.getProfile(lineUserId);
        if (!profile) {
            log.warn({ lineUserId }, 'Perfil no disponible, se registra sin datos de perfil');
        }

        return this.ensurePending({
            lineUserId,
            displayName: profile?.displayName,
            pictureUrl: profile?.pictureUrl,
        });
    }

    async ensurePending(dto: EnsureUserDTO): Promise<User> {
        const user = await this.userRepository.ensurePending(dto);
        log.debug({ lineUserId: user.lineUserId, status: user.status }, 'Usuario registrado/actualizado');
        return user;
    }

    /**
     * @throws NotFoundError si el usuario no existe
     */
    async getUser(lineUserId: string): Promise<User> {
        const user = await this.userRepository.findByLineUserId(lineUserId);
        if (!user) {
            throw new NotFoundError('User not found', { context: { lineUserId } });
        }
        return user;
    }

    async listUsers(): Promise<User[]> {
        return this.userRepository.findAll();
    }
}
