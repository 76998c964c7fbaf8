// lib/utils/uuid.ts
export function safeUUID(): string {
  const c: Crypto | undefined = globalThis.crypto;

  // 1) 原生 randomUUID（Node 20 / 新版瀏覽器）
  if (typeof c?.randomUUID === "function") return c.randomUUID();

  // 2) 用 getRandomValues 自己組 v4
  const bytes = new Uint8Array(16);
  if (typeof c?.getRandomValues === "function") {
    c.getRandomValues(bytes);
  } else {
    // 最後手段（無加密強度）
    for (let i = 0; i < 16; i++) bytes[i] = Math.floor(Math.random() * 256);
  }
  bytes[6] = (bytes[6] & 0x0f) | 0x40; // version 4
  bytes[8] = (bytes[8] & 0x3f) | 0x80; // variant 10

  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}
