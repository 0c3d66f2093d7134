/**
 * Tushare 数据模型
 */

/** 单元格取值，Tushare 只返回字符串、数字或 null */
export type TushareScalar = string | number | null;

/** 一行数据：字段名 → 取值 */
export type TushareRow = Record<string, TushareScalar>;

/**
 * 一次查询的结果集
 *
 * fields 是上游声明的字段列表，即使 rows 为空也能判断某字段是否在结构中。
 * 行的先后顺序没有约定含义，需要排序时必须显式排序。
 */
export interface RecordSet {
    readonly fields: readonly string[];
    readonly rows: readonly TushareRow[];
}

/** 请求参数，undefined 和空字符串不会被发送 */
export type TushareParams = Record<string, string | number | undefined>;

export interface TusharePayload {
    api_name: string;
    token: string;
    params: Record<string, string | number>;
    fields?: string;
}

/** 面向 JSON 输出的记录：只保留结构中的字段，缺失值为 null */
export type JsonRecord = Record<string, TushareScalar>;
