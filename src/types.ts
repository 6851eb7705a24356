// Non domain types

export type NotificationPayload = {
    readonly to: string;
    readonly subject: string;
    readonly body: string;
};

export type SessionRecord = {
    readonly userId: number;
    readonly userName: string;
};
