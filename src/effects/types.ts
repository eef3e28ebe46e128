// ============================================================================
// Configuration
// ============================================================================

export type ReportConfig = {
    readonly outputPath: string;
    readonly defaultStrategy?: string;
}

export type EmailConfig = {
    // no host means messages are rendered but never delivered
    readonly host?: string;
    readonly port: number;
    readonly from: string;
    readonly staffRecipients: readonly string[];
}

export type ServerConfig = {
    readonly port: number;
}

export type AppConfig = {
    readonly reports: ReportConfig;
    readonly email: EmailConfig;
    readonly server: ServerConfig;
}
