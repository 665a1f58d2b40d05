import type { UserAttributes, UserModel, UserRecord } from '../db/models/user.model.js';
import { User } from '../domain/user.js';
import type { EnsureUserDTO } from '../dtos/user.dto.js';
import { ExternalServiceError } from '../errors.js';
import { logger } from '../logger.js';

const log = logger.child({ service: 'user-repository' });

export interface UserRepository {
    ensurePending(dto: EnsureUserDTO): Promise<User>;
    markRegistered(lineUserId: string, code: string): Promise<User | null>;
    findByLineUserId(lineUserId: string): Promise<User | null>;
    findAll(): Promise<User[]>;
}

export class MongoUserRepository implements UserRepository {

    constructor(private model: UserModel) {}

    /**
     * Upsert atómico: crea el usuario como pending si no existe,
     * si existe refresca nombre/foto sin tocar el estado.
     * Sólo se pisan los campos de perfil recibidos.
     */
    async ensurePending(dto: EnsureUserDTO): Promise<User> {
        const profile: Partial<Pick<UserAttributes, 'displayName' | 'pictureUrl'>> = {};
        if (dto.displayName !== undefined) profile.displayName = dto.displayName;
        if (dto.pictureUrl !== undefined) profile.pictureUrl = dto.pictureUrl;

        try {
            const data: UserRecord | null = await this.model
                .findOneAndUpdate(
                    { lineUserId: dto.lineUserId },
                    {
                        $set: profile,
                        $setOnInsert: { status: 'pending' },
                    },
                    { upsert: true, new: true }
                )
                .lean<UserRecord>()
                .exec();

            if (!data) {
                throw new ExternalServiceError('MongoDB no devolvió el documento del upsert', {
                    context: { lineUserId: dto.lineUserId },
                });
            }
            return User.create(data);
        } catch (error) {
            log.error({ err: error, lineUserId: dto.lineUserId }, 'Error registrando usuario');
            throw error;
        }
    }

    async markRegistered(lineUserId: string, code: string): Promise<User | null> {
        try {
            const data: UserRecord | null = await this.model
                .findOneAndUpdate(
                    { lineUserId },
                    // Mismo reloj que completedAt del ticket ($$NOW)
                    [
                        {
                            $set: {
                                status: 'registered',
                                registrationCode: { $literal: code },
                                registeredAt: '$$NOW',
                            },
                        },
                    ],
                    { new: true }
                )
                .lean<UserRecord>()
                .exec();
            return data ? User.create(data) : null;
        } catch (error) {
            log.error({ err: error, lineUserId }, 'Error marcando usuario como registrado');
            throw error;
        }
    }

    async findByLineUserId(lineUserId: string): Promise<User | null> {
        const data: UserRecord | null = await this.model
            .findOne({ lineUserId })
            .lean<UserRecord>()
            .exec();
        return data ? User.create(data) : null;
    }

    async findAll(): Promise<User[]> {
        const data: UserRecord[] = await this.model
            .find({})
            .sort({ createdAt: 1 })
            .lean<UserRecord[]>()
            .exec();
        return data.map((record) => User.create(record));
    }
}
