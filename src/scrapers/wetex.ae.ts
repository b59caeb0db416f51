import type { ListingSite } from './types.js';

const site: ListingSite = {
  domain: 'wetex.ae',
  url: 'https://www.wetex.ae/exhibit',
  tableClass: 'm19-table__content-table',
  tableBodyId: 'tb_exhibit',
  dataRowClass: 'm19-table__content-table-row',
  cellClass: 'm19-table__content-table-cell',
  markers: {
    fixed: 'fixed-col',
    hidden: 'hidden-col'
  },
  totalRecordsId: 'TotalRecords',
  pagination: {
    itemSelector: '#pagination li[data-num]',
    pageAttribute: 'data-num',
    controlClass: 'pagination-button',
    pageFunction: 'SetPageNumber'
  },
  directRequest: {
    path: '/umbraco/surface/wetexdatasurface/GetExhibitorList',
    pageParam: 'PageNumber',
    sizeParam: 'Records',
    fixedParams: {
      OrderBy: '1',
      SearchBy: '0',
      type: '1',
      Search: ''
    }
  },
  pageSize: 20
};

export default site;
