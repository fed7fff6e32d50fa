import { describe, it, expect, beforeEach } from 'vitest';
import { CustomerQueryService } from '../../src/domains/customers/customer-query.service';
import { InMemoryRecords, row } from '../helpers/in-memory-records';

describe('CustomerQueryService', () => {
  let records: InMemoryRecords;
  let service: CustomerQueryService;

  beforeEach(() => {
    records = new InMemoryRecords([
      row('T-2', 'C-10', 'Zeta Mills', '100.00'),
      row('T-1', 'C-20', 'Acme Power', '250.00'),
      row('T-3', 'C-10', 'Acme Power', null),
      row('T-0', 'C-20', 'Acme Power', '50.00'),
      row('', 'C-30', 'Acme Power', '10.00'),
      row('T-9', null, 'Orphan Co', '5.00'),
      row('T-8', 'C-40', '', '5.00'),
    ]);
    service = new CustomerQueryService(records);
  });

  describe('listAll', () => {
    it('returns valid rows ordered by customer then serial', async () => {
      const all = await service.listAll();
      expect(all).toEqual([
        { serial: 'T-0', contract: 'C-20', customer: 'Acme Power', power: 50 },
        { serial: 'T-1', contract: 'C-20', customer: 'Acme Power', power: 250 },
        { serial: 'T-3', contract: 'C-10', customer: 'Acme Power', power: null },
        { serial: 'T-2', contract: 'C-10', customer: 'Zeta Mills', power: 100 },
      ]);
    });
  });

  describe('listUniqueCustomerNames', () => {
    it('returns distinct names from valid rows only', async () => {
      expect(await service.listUniqueCustomerNames()).toEqual(['Acme Power', 'Zeta Mills']);
    });
  });

  describe('listContractsForCustomer', () => {
    it('filters by exact name and orders by contract then serial', async () => {
      const rows = await service.listContractsForCustomer('Acme Power');
      expect(rows.map((r) => `${r.contract}/${r.serial}`)).toEqual(['C-10/T-3', 'C-20/T-0', 'C-20/T-1']);
    });

    it('does not match on case or prefix', async () => {
      expect(await service.listContractsForCustomer('acme power')).toEqual([]);
      expect(await service.listContractsForCustomer('Acme')).toEqual([]);
    });
  });

  describe('listDistinctContractIds', () => {
    it('includes contracts from rows whose other keys are empty', async () => {
      expect(await service.listDistinctContractIds()).toEqual(['C-10', 'C-20', 'C-30', 'C-40']);
    });
  });

  describe('getCustomersWithContracts', () => {
    it('aggregates the valid rows', async () => {
      const customers = await service.getCustomersWithContracts();
      expect(customers.map((c) => [c.customerName, c.uniqueContractCount, c.totalTransformers, c.totalPower])).toEqual([
        ['Acme Power', 2, 3, 300],
        ['Zeta Mills', 1, 1, 100],
      ]);
    });
  });

  describe('countDistinctCustomersWithContracts', () => {
    it('counts customers, not rows', async () => {
      expect(await service.countDistinctCustomersWithContracts()).toBe(2);
      expect(await service.countValidRecords()).toBe(4);
    });
  });

  describe('when storage is unreachable', () => {
    beforeEach(() => {
      records.reachable = false;
    });

    it('answers with empty results instead of throwing', async () => {
      await expect(service.listAll()).resolves.toEqual([]);
      await expect(service.listUniqueCustomerNames()).resolves.toEqual([]);
      await expect(service.listContractsForCustomer('Acme Power')).resolves.toEqual([]);
      await expect(service.listDistinctContractIds()).resolves.toEqual([]);
      await expect(service.getCustomersWithContracts()).resolves.toEqual([]);
      await expect(service.countDistinctCustomersWithContracts()).resolves.toBe(0);
    });
  });
});
