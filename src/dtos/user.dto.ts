
/**
 * DTO para registrar/refrescar un usuario de LINE
 * Lo que recibe el repositorio desde el servicio
 */
export interface EnsureUserDTO {
    lineUserId: string;
    displayName?: string | undefined;
    pictureUrl?: string | undefined;
}

/**
 * DTO para reclamar un código de registro
 */
export interface ClaimRegistrationDTO {
    code: string;
    lineUserId: string;
    displayName?: string | undefined;
    pictureUrl?: string | undefined;
}
