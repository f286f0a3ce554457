import type { Result } from "~shared/utils/Result";

import type { Exif, ReadError } from "./Exif";

export interface ExifService {
  /**
   * 讀取拍攝時間與 GPS。
   * 讀不到時回傳錯誤而不丟例外，由呼叫端決定視為未知地點或改用修改時間。
   */
  readExif(filePath: string): Promise<Result<Exif, ReadError>>;
}
