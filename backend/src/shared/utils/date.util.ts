// backend/src/shared/utils/date.util.ts
export class DateUtil {
    private static readonly DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

    /**
     * Local calendar date as YYYY-MM-DD.
     */
    static formatDate(date: Date): string {
        const year = date.getFullYear();
        const month = String(date.getMonth() + 1).padStart(2, '0');
        const day = String(date.getDate()).padStart(2, '0');
        return `${year}-${month}-${day}`;
    }

    static today(): string {
        return DateUtil.formatDate(new Date());
    }

    /**
     * True for an existing calendar day written as YYYY-MM-DD (rejects 2024-02-30).
     */
    static isValidDate(value: string): boolean {
        const match = DateUtil.DATE_REGEX.exec(value);
        if (!match) return false;

        const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
        const date = new Date(0);
        date.setUTCFullYear(year, month - 1, day);
        return date.getUTCFullYear() === year
            && date.getUTCMonth() === month - 1
            && date.getUTCDate() === day;
    }
}
