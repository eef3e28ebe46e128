// Non domain types

export type NotificationKind = 'ORDER_PROCESSED' | 'ORDER_FAILED' | 'ORDER_SHIPPED';

export type NotificationPayload = {
    readonly kind: NotificationKind;
    readonly to: readonly string[];
    readonly subject: string;
    readonly body: string;
};

export type AuditAction = 'ORDER_PROCESSED' | 'ORDER_PROCESSING_ERROR';

export type AuditEntry = {
    readonly entryId: string;
    readonly action: AuditAction;
    readonly orderId: string;
    readonly customerId: string;
    readonly timestamp: Date;
    readonly success: boolean;
    readonly errorMessage: string | null;
    readonly data: Readonly<Record<string, string>>;
};
