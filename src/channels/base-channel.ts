/**
 * 通道基类
 * 
 * 定义对外接入通道的基本接口和生命周期。
 */

/** 通道接口 */
export interface Channel {
  /** 通道名称 */
  readonly name: string;
  /** 启动通道 */
  start(): Promise<void>;
  /** 停止通道 */
  stop(): Promise<void>;
}
