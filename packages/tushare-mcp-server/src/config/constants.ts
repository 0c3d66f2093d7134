/**
 * Tushare MCP Server Constants
 */

// 日期/报告期格式 YYYYMMDD
export const YMD_REGEX = /^\d{8}$/;

// Tushare API 默认地址
export const TUSHARE_DEFAULT_BASE_URL = 'https://api.tushare.pro';

// Token 文件位置（相对用户主目录）
export const TOKEN_ENV_DIR = '.tushare_mcp';
export const TOKEN_ENV_FILE = '.env';
export const TOKEN_ENV_KEY = 'TUSHARE_TOKEN';

// 工具分类
export const TOOL_CATEGORIES = {
    TOKEN: 'token',
    STOCK: 'stock',
    FINANCIAL: 'financial',
    INDEX: 'index',
    MARKET: 'market',
} as const;

// 缓存 TTL (秒)
export const CACHE_TTL = {
    STOCK_LIST: 3600,       // 全市场股票列表：1小时
    STOCK_NAME: 86400,      // 股票名称：24小时
    DEFAULT: 600,
} as const;

// 列表输出上限
export const OUTPUT_LIMITS = {
    STOCK_BASIC: 50,
    KPL_CONCEPT: 20,
    TOP_LIST: 30,
    INDEX_CONSTITUENTS: 50,
    PLEDGE: 20,
} as const;

// 各接口请求字段
export const FIELDS = {
    STOCK_BASIC: 'ts_code,name,area,industry,list_date,market,exchange,list_status,delist_date',
    STOCK_BASIC_FULL: 'ts_code,name,area,industry,fullname,enname,market,exchange,curr_type,list_status,list_date,delist_date,is_hs',
    STOCK_SEARCH: 'ts_code,symbol,name,area,industry,market,list_date',
    STOCK_NAME: 'ts_code,name',
    HK_NAME: 'ts_code,name',
    DAILY: 'ts_code,trade_date,open,high,low,close,pre_close,change,pct_chg,vol,amount',
    DAILY_CLOSE: 'trade_date,close',
    DAILY_METRICS: 'ts_code,trade_date,close,turnover_rate,turnover_rate_f,volume_ratio,pe,pe_ttm,pb,ps,ps_ttm,dv_ratio,dv_ttm,total_share,float_share,free_share,total_mv,circ_mv',
    DAILY_BASIC_INFO: 'ts_code,trade_date,close,pe,pb,dv_ratio,total_share,float_share,free_share,total_mv,circ_mv,turnover_rate,volume_ratio',
    HOLDER_NUMBER: 'ts_code,ann_date,enddate,holder_num',
    TOP_HOLDERS: 'ts_code,ann_date,end_date,holder_name,hold_amount,hold_ratio',
    PLEDGE_STAT: 'ts_code,end_date,pledge_count,unrest_pledge,rest_pledge,total_share,pledge_ratio',
    FINA_INDICATOR: 'ts_code,ann_date,end_date,eps,dt_eps,grossprofit_margin,netprofit_margin,roe_yearly,roe_waa,roe_dt,n_income_attr_p,total_revenue,rd_exp,debt_to_assets,n_income_attr_p_yoy,dtprofit_yoy,tr_yoy,or_yoy,bps,ocfps,update_flag',
    INCOME: 'ts_code,ann_date,f_ann_date,end_date,report_type,comp_type,basic_eps,diluted_eps,total_revenue,revenue,int_income,prem_earned,comm_income,oth_biz_income,total_cogs,oper_cost,int_exp,comm_exp,biz_tax_surchg,sell_exp,admin_exp,fin_exp,assets_impair_loss,oper_profit,non_oper_revenue,non_oper_exp,n_income,n_income_attr_p,minority_gain,ebit,ebitda',
    INCOME_PREVIOUS: 'ts_code,ann_date,end_date,n_income_attr_p',
    BALANCE_SHEET: 'ts_code,ann_date,f_ann_date,end_date,report_type,comp_type,total_share,cap_rese,undistr_porfit,surplus_rese,special_rese,money_cap,trad_asset,notes_receiv,accounts_receiv,oth_receiv,prepayment,inventories,total_cur_assets,total_assets,accounts_payable,adv_receipts,total_cur_liab,total_liab,lt_borr,total_hldr_eqy_exc_min_int,r_and_d_costs',
    CASH_FLOW: 'ts_code,ann_date,f_ann_date,end_date,report_type,comp_type,net_profit,finan_exp,c_fr_sale_sg,recp_tax_rends,n_depos_incr_fi,n_disp_subs_oth_biz,n_cashflow_act,st_cash_out_act,n_cashflow_inv_act,st_cash_out_inv_act,n_cashflow_fin_act,st_cash_out_fin_act,free_cashflow',
    MAIN_BUSINESS: 'ts_code,end_date,bz_item,bz_sales,bz_profit,bz_cost,curr_type,update_flag',
    AUDIT: 'ts_code,ann_date,end_date,audit_result,audit_fees,audit_agency,audit_sign',
    INDEX_BASIC: 'ts_code,name,fullname,market,publisher,category,list_date,base_date,base_point,index_type',
    INDEX_BASIC_FULL: 'ts_code,name,fullname,market,publisher,category,list_date,base_date,base_point,index_type,weight_rule,desc,exp_date',
    INDEX_WEIGHT: 'index_code,con_code,trade_date,weight',
    INDEX_GLOBAL: 'ts_code,trade_date,open,close,high,low,pre_close,change,pct_chg,swing,vol,amount',
    TOP_LIST: 'trade_date,ts_code,name,close,pct_chg,turnover_rate,amount,l_sell,l_buy,l_amount,net_amount,net_rate,amount_rate,float_values,reason',
    TOP_INST: 'trade_date,ts_code,exalter,side,buy,buy_rate,sell,sell_rate,net_buy,reason',
    KPL_CONCEPT: 'trade_date,ts_code,name,z_t_num,up_num',
    TRADE_CAL: 'exchange,cal_date,is_open',
} as const;

// HTTP 状态码
export const HTTP_STATUS = {
    OK: 200,
    BAD_REQUEST: 400,
    UNAUTHORIZED: 401,
    NOT_FOUND: 404,
    UNPROCESSABLE: 422,
    INTERNAL_ERROR: 500,
    SERVICE_UNAVAILABLE: 503,
} as const;
