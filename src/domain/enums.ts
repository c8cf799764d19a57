export enum LedgerSection {
  Assets = 'assets',
  Liabilities = 'liabilities',
  Equity = 'equity',
}

export enum AssetCategory {
  CashReserves = 'cash_reserves',
  HqlaLevel1 = 'hqla_level1',
  HqlaLevel2A = 'hqla_level2a',
  HqlaLevel2B = 'hqla_level2b',
  PerformingLoans = 'performing_loans',
  Npl = 'npl',
  RealEstate = 'real_estate',
  OtherSecurities = 'other_securities',
  OtherAssets = 'other_assets',
}

export enum LiabilityCategory {
  RetailStable = 'retail_stable',
  RetailUnstable = 'retail_unstable',
  CorporateDeposits = 'corporate_deposits',
  WholesaleFunding = 'wholesale_funding',
  SecuredFunding = 'secured_funding',
  OtherLiabilities = 'other_liabilities',
}

export enum EquityCategory {
  Cet1 = 'cet1',
  At1 = 'at1',
  Tier2 = 'tier2',
}

export type LineItemKey = AssetCategory | LiabilityCategory | EquityCategory;

export enum TimeGranularity {
  Daily = 'Daily',
  Monthly = 'Monthly',
  Quarterly = 'Quarterly',
  Yearly = 'Yearly',
}

export enum LiquidationLabel {
  Cash = 'Cash',
  HqlaLevel1 = 'HQLA Level 1',
  HqlaLevel2A = 'HQLA Level 2A',
  HqlaLevel2B = 'HQLA Level 2B',
  OtherSecurities = 'Other Securities',
  PerformingLoans = 'Performing Loans',
  RealEstate = 'Real Estate',
}

export enum BreachType {
  LCR = 'LCR',
  CET1 = 'CET1',
  Liquidity = 'Liquidity',
}

// Selectable in the dashboard; the engine records them but does not act on them.
export enum RecoveryAction {
  AssetSales = 'Asset Sales',
  CapitalRaising = 'Capital Raising',
  CentralBankFacility = 'Central Bank Facility',
  DividendSuspension = 'Dividend Suspension',
  At1Conversion = 'AT1 Conversion',
  LiabilityManagementExercise = 'Liability Management Exercise',
  BranchClosures = 'Branch Closures',
  StaffReductions = 'Staff Reductions',
}
