export { computeInstallment } from './installment';
