/**
 * 报告的存储后端
 *
 * 只暴露一个“持久化具名数据”的操作，重试、退避等策略由后端自己决定
 */
export interface ReportStorage {
  /**
   * 写入一份渲染好的报告
   *
   * @param name 报告名，由两个随机的十六进制串拼接而成
   * @param extension 文件扩展名，与输出格式对应
   * @param body 渲染后的内容
   * @param contentType 内容类型
   * @returns 报告存储的位置（文件路径、对象键等）
   */
  write(
    name: string,
    extension: string,
    body: string,
    contentType: string,
  ): Promise<string>;
}
