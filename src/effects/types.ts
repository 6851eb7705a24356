// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type RedisConfig = {
    readonly host: string;
    readonly port: number;
}

export type SessionConfig = {
    readonly ttlSeconds: number;
}

export type EmailConfig = {
    readonly host: string;
    readonly port: number;
    readonly from: string;
}

export type AwsConfig = {
    readonly region: string;
    readonly accessKeyId: string;
    readonly secretAccessKey: string;
    readonly monitoringEndpoint: string;
    readonly alertTopicArn: string;
}

export type ApiConfig = {
    readonly port: number;
}

export type ProductionConfig = {
    readonly database: DatabaseConfig;
    readonly redis: RedisConfig;
    readonly session: SessionConfig;
    readonly email: EmailConfig;
    readonly aws: AwsConfig;
    readonly api: ApiConfig;
}
