/**
 * Mensajes que ve el usuario en LINE.
 * Todos los textos del bot están centralizados aquí (en tailandés).
 */

export const DEFAULT_DISPLAY_NAME = 'คุณ';

export const CLEAR_HISTORY_COMMAND = '/clear';

export const REGISTER_KEYWORD = 'ลงทะเบียน';

export const CHAT_MESSAGES = {
    UNSUPPORTED_MESSAGE: 'ขออภัย ตอนนี้รองรับเฉพาะข้อความตัวอักษรเท่านั้น',

    HISTORY_CLEARED: (deleted: number) => `ลบประวัติแชท ${deleted} ข้อความแล้ว`,

    WELCOME: (displayName: string) =>
        `สวัสดีครับ ${displayName}!\n\n` +
        'ยินดีต้อนรับสู่ AI Chatbot\n' +
        'พิมพ์ข้อความมาได้เลยครับ ผมพร้อมช่วยเหลือคุณ\n\n' +
        `พิมพ์ ${CLEAR_HISTORY_COMMAND} เพื่อลบประวัติแชท`,
} as const;

export const REGISTRATION_MESSAGES = {
    INSTRUCTIONS: 'กรุณานำ User ID ด้านล่างนี้ไปลงทะเบียนในระบบร้านค้า แล้วส่งรหัส 4 หลักที่ได้รับกลับมาที่แชทนี้',

    SUCCESS: (shopName: string, displayName: string) =>
        `ลงทะเบียนสำเร็จ! 🎉\n\nคุณ ${displayName} ได้เชื่อมต่อกับร้าน ${shopName} เรียบร้อยแล้ว`,
} as const;

export const AI_MESSAGES = {
    SYSTEM_PROMPT:
        'คุณเป็นผู้ช่วย AI ที่เป็นมิตรและช่วยเหลือผู้ใช้ได้ดี\n' +
        'ตอบคำถามเป็นภาษาไทยอย่างสุภาพและเป็นกันเอง\n' +
        'ถ้าไม่แน่ใจในคำตอบ ให้บอกตรงๆ ว่าไม่แน่ใจ',

    NOT_CONFIGURED: 'ขออภัย ยังไม่ได้ตั้งค่า GEMINI_API_KEY',

    CONNECTION_ERROR: 'ขออภัย เกิดข้อผิดพลาดในการเชื่อมต่อ AI',
} as const;
