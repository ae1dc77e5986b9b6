/**
 * 업로드 파일명 유틸리티
 */

/**
 * Multer 가 넘겨준 originalname 복원
 *
 * Multer 는 multipart 의 filename 을 Latin-1 로 해석하므로 UTF-8 로 보낸
 * 포르투갈어/한글 파일명이 깨집니다. Latin-1 범위를 벗어난 문자가 있으면 이미 올바른 문자열로 보고,
 * 다시 디코딩했을 때 깨진 문자가 생기면 원본을 그대로 사용합니다.
 */
export function decodeUploadFileName(fileName: string): string {
  if (!fileName || /[^\u0000-\u00ff]/.test(fileName)) {
    return fileName;
  }

  const decoded = Buffer.from(fileName, 'latin1').toString('utf8');
  return decoded.includes('\uFFFD') ? fileName : decoded;
}
