// SPDX-License-Identifier: Apache-2.0
export * from './ethService/ethCommonService/CommonService';
export * from './ethService/ethCommonService/ICommonService';
export * from './ethService/ethFilterService/FilterService';
export * from './ethService/ethFilterService/IFilterService';
export * from './ethService/accountService/AccountService';
export * from './ethService/accountService/IAccountService';
export * from './ethService/blockService/BlockService';
export * from './ethService/blockService/IBlockService';
export * from './ethService/contractService/ContractService';
export * from './ethService/contractService/IContractService';
export * from './ethService/miningService/MiningService';
export * from './ethService/miningService/IMiningService';
export * from './ethService/transactionService/TransactionService';
export * from './ethService/transactionService/ITransactionService';
